#!/usr/bin/env node
import 'dotenv/config';
import { buildProgram } from './cli/program';
import { error } from './utils/log';

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    error('CLI', err instanceof Error ? err.message : String(err));
    process.exitCode = 2;
  });
