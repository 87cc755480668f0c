import { describe, it, expect } from 'vitest';
import { VERSION, defineSchema, field, loadConfig, parseTypeNotation, t } from './index.js';

describe('schemacast', () => {
  describe('VERSION', () => {
    it('follows semver format', () => {
      expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
    });

    it('matches the package version', () => {
      expect(VERSION).toBe('0.1.0');
    });
  });

  describe('public API', () => {
    it('exposes schema definition and construction', () => {
      const Point = defineSchema('Point', {
        x: t.integer(),
        y: field(t.integer(), { default: 0 }),
      });

      expect(String(Point.construct({ x: 3 }))).toBe('Point(x=3, y=0)');
    });

    it('exposes the document layer', () => {
      expect(typeof loadConfig).toBe('function');
      expect(parseTypeNotation('list[int]')).toEqual(t.list(t.integer()));
    });
  });
});
