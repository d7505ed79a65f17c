#!/usr/bin/env node
/**
 * kbrank Command-Line Interface
 *
 * Usage: kbrank <command> [options]
 */

import { run } from './run.js';
import { closeDb } from '../storage/db.js';

run(process.argv.slice(2))
  .then(() => closeDb())
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
