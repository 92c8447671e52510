#!/usr/bin/env node
import { loadEnvFiles } from './config.js';
import { createProgram, formatCliError } from './cli.js';

loadEnvFiles();

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    console.error(formatCliError(err));
    process.exit(1);
  });
