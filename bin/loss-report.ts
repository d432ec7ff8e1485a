#!/usr/bin/env tsx
/**
 * Loss report CLI entry point.
 */

import { createProgram } from '../src/cli/loss-report-command';

createProgram(code => {
  process.exitCode = code;
}).parse(process.argv);
