#!/usr/bin/env node

/**
 * schemacast CLI entry point.
 *
 * This is the main entry point for the 'schemacast' CLI command.
 */

import { createCliContext, runCli } from './app.js';
import { withErrorHandling } from './utils/errorHandling.js';

withErrorHandling(() => runCli(createCliContext()));
