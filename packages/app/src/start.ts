#!/usr/bin/env node

/**
 * Main application entry point
 */

// Load environment variables from .env file
import 'dotenv/config';

import { runCli } from './cli.js';

runCli(process.argv.slice(2), undefined, { globalHandlers: true }).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  }
);
