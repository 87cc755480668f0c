import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { t } from './descriptors.js';
import { ConstructionError, SchemaRegistrationError } from './errors.js';
import { field } from './field.js';
import { defineSchema, toRecord } from './schema.js';

function constructionError(fn: () => unknown): ConstructionError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConstructionError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ConstructionError');
}

const Address = defineSchema('Address', {
  city: t.string(),
  zip: field(t.string(), { default: '00000' }),
});

const Server = defineSchema('Server', {
  host: t.string(),
  port: field(t.integer(), { default: 8080 }),
  tlsCert: field(t.string(), { alias: 'tls-cert', default: '' }),
  mode: field(t.string(), { default: 'safe', options: ['safe', 'fast'] }),
  tags: field(t.list(t.string()), { default: () => [] }),
  address: field(t.nested(Address), { default: () => ({ city: 'Nowhere' }) }),
});

describe('defineSchema', () => {
  it('classifies fields in declaration order', () => {
    expect(Server.name).toBe('Server');
    expect(Server.fields.map((spec) => spec.name)).toEqual([
      'host',
      'port',
      'tlsCert',
      'mode',
      'tags',
      'address',
    ]);
    expect([...Server.required.keys()]).toEqual(['host']);
    expect([...Server.optional.keys()]).toEqual(['port', 'tlsCert', 'mode', 'tags', 'address']);
  });

  it('maps input keys to field names', () => {
    expect(Server.aliases.get('tls-cert')).toBe('tlsCert');
    expect(Server.aliases.has('tlsCert')).toBe(false);
    expect(Server.aliases.get('host')).toBe('host');
  });

  it('returns a frozen schema with default settings', () => {
    expect(Object.isFrozen(Server)).toBe(true);
    expect(Server.settings).toEqual({ ignoreUnknownFields: false, ignoreMissingFields: false });
  });

  it('rejects invalid declarations', () => {
    expect(() => defineSchema('Bad', { tags: t.list() })).toThrow(SchemaRegistrationError);
    expect(() =>
      defineSchema('Bad', { flags: t.map(t.boolean(), t.string()) })
    ).toThrow("The dict 'flags' cannot use key type 'bool'");
  });

  it('rejects two fields reading the same input key', () => {
    let caught: unknown;
    try {
      defineSchema('Clash', { a: field(t.integer(), { alias: 'b' }), b: t.integer() });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SchemaRegistrationError);
    if (caught instanceof SchemaRegistrationError) {
      expect(caught.code).toBe('DUPLICATE_INPUT_KEY');
      expect(caught.field).toBe('b');
      expect(caught.message).toBe("Fields 'Clash.a' and 'Clash.b' both read input key 'b'");
    }
  });

  it('never calls factories at definition time', () => {
    let calls = 0;
    defineSchema('Lazy', {
      items: field(t.list(t.integer()), {
        default: () => {
          calls += 1;
          return [];
        },
      }),
    });

    expect(calls).toBe(0);
  });
});

describe('construct', () => {
  it('fills defaults for missing optional fields', () => {
    const server = Server.construct({ host: 'localhost' });

    expect(toRecord(server)).toEqual({
      host: 'localhost',
      port: 8080,
      tlsCert: '',
      mode: 'safe',
      tags: [],
      address: Address.construct({ city: 'Nowhere' }),
    });
    expect(Address.isInstance(server.address)).toBe(true);
  });

  it('gives typed access to fields', () => {
    const server = Server.construct({ host: 'localhost', port: 443 });
    const port: number = server.port;

    expect(port).toBe(443);
  });

  it('builds fresh containers for each instance', () => {
    const input = { host: 'a', tags: ['x'] };
    const first = Server.construct(input);
    const second = Server.construct({ host: 'b' });
    const third = Server.construct({ host: 'c' });

    expect(first.tags).toEqual(['x']);
    expect(first.tags).not.toBe(input.tags);
    expect(second.tags).not.toBe(third.tags);
  });

  it('accepts Map input', () => {
    const server = Server.construct(new Map([['host', 'localhost']]));
    expect(server.host).toBe('localhost');
  });

  it('reports the first error in input order', () => {
    const error = constructionError(() => Server.construct({ host: 1, port: 'x' }));

    expect(error.code).toBe('WRONG_TYPE');
    expect(error.message).toBe("Wrong type 'integer' with value '1' for key 'host'. Expected 'str'.");
  });

  it('rejects null and unsupported native values', () => {
    expect(constructionError(() => Server.construct({ host: null })).message).toBe(
      "Value of type 'null' is not supported for key 'host'"
    );
    expect(constructionError(() => Server.construct({ host: new Date(0) })).message).toBe(
      "Value of type 'Date' is not supported for key 'host'"
    );
  });

  it('rejects objects whose prototype chain has no constructor', () => {
    const bare: unknown = Object.create(Object.create(null));
    const error = constructionError(() => Server.construct({ host: bare }));

    expect(error.code).toBe('UNSUPPORTED_TYPE');
    expect(error.message).toBe("Value of type 'object' is not supported for key 'host'");
  });

  it('rejects anything but a single mapping', () => {
    const list: unknown = JSON.parse('[1]');
    const error = constructionError(() => Reflect.apply(Server.construct, Server, [list]));

    expect(error.code).toBe('USAGE_ERROR');
    expect(error.message).toBe("Construct 'Server' with either a mapping or named fields Got a list.");
    expect(
      constructionError(() => Reflect.apply(Server.construct, Server, [{ host: 'a' }, { port: 1 }]))
        .detail
    ).toBe('Got a mapping and additional arguments.');
  });

  it('renders through toString', () => {
    const server = Server.construct({ host: 'localhost', tags: ['a'] });

    expect(String(server)).toBe(
      "Server(host=localhost, port=8080, tlsCert=, mode=safe, tags=['a'], " +
        'address=Address(city=Nowhere, zip=00000))'
    );
    expect(Server.render(server)).toBe(String(server));
  });

  it('recognizes its own instances only', () => {
    expect(Server.isInstance(Server.construct({ host: 'a' }))).toBe(true);
    expect(Server.isInstance({ host: 'a' })).toBe(false);
    expect(Address.isInstance(Server.construct({ host: 'a' }))).toBe(false);
  });
});

describe('required and missing fields', () => {
  it('fails on a missing required field', () => {
    const error = constructionError(() => Server.construct({}));

    expect(error.code).toBe('MISSING_REQUIRED_ARGUMENT');
    expect(error.message).toBe("Missing required argument 'host' for 'Server'");
  });

  it('names the input key of an aliased required field', () => {
    const Cert = defineSchema('Cert', { tlsCert: field(t.string(), { alias: 'tls-cert' }) });

    expect(constructionError(() => Cert.construct({})).message).toBe(
      "Missing required argument 'tlsCert' for 'Cert' (input key 'tls-cert')"
    );
  });

  it('leaves missing fields absent under ignoreMissingFields', () => {
    const Lenient = defineSchema(
      'Lenient',
      { host: t.string(), port: t.integer() },
      { ignoreMissingFields: true }
    );

    const instance = Lenient.construct({ port: 1 });

    expect('host' in instance).toBe(false);
    expect(instance.host).toBeUndefined();
    expect(toRecord(instance)).toEqual({ port: 1 });
  });
});

describe('unknown fields', () => {
  it('fails on an undeclared key', () => {
    const error = constructionError(() => Server.construct({ host: 'a', colour: 'red' }));

    expect(error.code).toBe('UNKNOWN_ARGUMENT');
    expect(error.message).toBe("Unknown argument 'red' of type 'string' with key 'colour'.");
  });

  it('drops undeclared keys under ignoreUnknownFields', () => {
    const Tolerant = defineSchema('Tolerant', { host: t.string() }, { ignoreUnknownFields: true });

    expect(toRecord(Tolerant.construct({ host: 'a', colour: 'red' }))).toEqual({ host: 'a' });
  });
});

describe('aliases', () => {
  it('populates an aliased field from its alias', () => {
    expect(Server.construct({ host: 'a', 'tls-cert': 'cert.pem' }).tlsCert).toBe('cert.pem');
  });

  it('does not match the field name when an alias is set', () => {
    const error = constructionError(() => Server.construct({ host: 'a', tlsCert: 'cert.pem' }));

    expect(error.code).toBe('UNKNOWN_ARGUMENT');
    expect(error.field).toBe('tlsCert');
  });
});

describe('allow-lists', () => {
  const Choice = defineSchema('Choice', { level: field(t.integer(), { options: [1, 2] }) });

  it('accepts listed values', () => {
    expect(Choice.construct({ level: 1 }).level).toBe(1);
    expect(Choice.construct({ level: 2 }).level).toBe(2);
  });

  it('rejects values that are not listed', () => {
    const error = constructionError(() => Choice.construct({ level: 3 }));

    expect(error.code).toBe('VALUE_NOT_AN_OPTION');
    expect(error.message).toBe(
      "Value of type 'integer' with value '3' is not an option for key 'level'. Choose one of: [1, 2]"
    );
  });

  it('treats negative zero as zero', () => {
    const Flag = defineSchema('Flag', { bit: field(t.float(), { options: [0, 1] }) });
    const input: Record<string, unknown> = JSON.parse('{"bit": -0}');

    expect(Object.is(Flag.construct(input).bit, -0)).toBe(true);
  });

  it('checks options before the type', () => {
    expect(constructionError(() => Choice.construct({ level: '1' })).code).toBe(
      'VALUE_NOT_AN_OPTION'
    );
  });

  it('compares raw container values structurally', () => {
    const Pair = defineSchema('Pair', {
      pair: field(t.list(t.integer()), { options: [[1, 2], [3, 4]] }),
    });

    expect(Pair.construct({ pair: [3, 4] }).pair).toEqual([3, 4]);
    expect(constructionError(() => Pair.construct({ pair: [4, 3] })).code).toBe(
      'VALUE_NOT_AN_OPTION'
    );
  });
});

describe('recursive containers', () => {
  const Containers = defineSchema('Containers', {
    a: t.list(t.list(t.integer())),
    b: t.list(t.map(t.integer(), t.integer())),
  });

  it('resolves lists of lists and lists of maps', () => {
    const instance = Containers.construct({
      a: [[1, 2, 3]],
      b: [new Map([[1, 1]]), new Map([[2, 2]])],
    });

    expect(instance.a).toEqual([[1, 2, 3]]);
    expect(instance.b).toEqual([new Map([[1, 1]]), new Map([[2, 2]])]);
  });

  it('reads document objects as maps with numeric keys', () => {
    const instance = Containers.construct({ a: [], b: [{ '1': 1 }, { '2': 2 }] });

    expect(instance.b).toEqual([new Map([[1, 1]]), new Map([[2, 2]])]);
  });
});

describe('nested schemas', () => {
  const Site = defineSchema('Site', { address: t.nested(Address) });
  const Fleet = defineSchema('Fleet', { servers: t.list(t.nested(Server)) });

  it('constructs nested instances', () => {
    const site = Site.construct({ address: { city: 'Oslo' } });

    expect(Address.isInstance(site.address)).toBe(true);
    expect(site.address.zip).toBe('00000');
  });

  it('prefixes nested errors with the outer field', () => {
    const error = constructionError(() => Site.construct({ address: { zip: '1' } }));

    expect(error.code).toBe('MISSING_REQUIRED_ARGUMENT');
    expect(error.path).toEqual(['address', 'city']);
    expect(error.message).toBe("Missing required argument 'address.city' for 'Address'");
  });

  it('reports list indexes on the way down', () => {
    const error = constructionError(() =>
      Fleet.construct({ servers: [{ host: 'a' }, { host: 'b', port: 'x' }] })
    );

    expect(error.field).toBe('servers[1].port');
    expect(error.message).toBe(
      "Wrong type 'string' with value 'x' for key 'servers[1].port'. Expected 'int'."
    );
  });
});

describe('factory defaults', () => {
  it('fails at construction when the factory returns the wrong type', () => {
    const Broken = defineSchema('Broken', {
      tags: field(t.list(t.string()), { default: () => 'oops' }),
    });

    const error = constructionError(() => Broken.construct({}));

    expect(error.code).toBe('WRONG_TYPE');
    expect(error.message).toBe(
      "Wrong type 'string' with value 'oops' for key 'Default of tags'. Expected 'list[str]'."
    );
  });

  it('fails when the factory returns nothing for a typed field', () => {
    const Empty = defineSchema('Empty', { count: field(t.integer(), { default: () => null }) });

    expect(constructionError(() => Empty.construct({})).message).toBe(
      "Wrong type 'null' with value 'null' for key 'Default of count'. Expected 'int'."
    );
  });

  it('accepts nothing from a factory for any', () => {
    const Loose = defineSchema('Loose', { extra: field(t.any(), { default: () => null }) });

    expect(Loose.construct({}).extra).toBeNull();
  });
});

describe('constructFromFields', () => {
  it('builds the same instance as construct', () => {
    const input = { host: 'a', port: 1, 'tls-cert': 'c', tags: ['x'] };

    expect(toRecord(Server.constructFromFields(input))).toEqual(toRecord(Server.construct(input)));
  });

  it('rejects extra positional arguments', () => {
    const error = constructionError(() =>
      Reflect.apply(Server.constructFromFields, Server, [{ host: 'a' }, 1])
    );

    expect(error.detail).toBe('Pass named fields as a single object.');
  });
});

describe('toRecord', () => {
  it('keeps nested instances as they are', () => {
    const server = Server.construct({ host: 'a' });

    expect(toRecord(server).address).toBe(server.address);
  });

  it('falls back to own entries for plain objects', () => {
    expect(toRecord({ a: 1 })).toEqual({ a: 1 });
    expect(toRecord(null)).toEqual({});
  });
});

describe('property-based tests', () => {
  const Sample = defineSchema('Sample', {
    name: t.string(),
    count: t.integer(),
    ratio: t.float(),
    enabled: t.boolean(),
    labels: t.list(t.string()),
  });

  const validInput = fc.record({
    name: fc.string(),
    count: fc.integer(),
    ratio: fc.double({ noNaN: true }),
    enabled: fc.boolean(),
    labels: fc.array(fc.string()),
  });

  it('returns every field equal to its input', () => {
    fc.assert(
      fc.property(validInput, (input) => {
        expect(toRecord(Sample.construct(input))).toEqual(input);
      })
    );
  });

  it('builds equal instances through both entry points', () => {
    fc.assert(
      fc.property(validInput, (input) => {
        expect(toRecord(Sample.constructFromFields(input))).toEqual(toRecord(Sample.construct(input)));
      })
    );
  });

  it('fails on every missing required field', () => {
    fc.assert(
      fc.property(validInput, fc.constantFrom('name', 'count', 'ratio', 'enabled', 'labels'), (input, missing) => {
        const partial = Object.fromEntries(Object.entries(input).filter(([key]) => key !== missing));
        const error = constructionError(() => Sample.construct(partial));
        expect(error.code).toBe('MISSING_REQUIRED_ARGUMENT');
        expect(error.field).toBe(missing);
      })
    );
  });
});
