#!/usr/bin/env node
import 'dotenv/config';
import { buildCli } from './cli/commands.js';

buildCli()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`workgen: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
