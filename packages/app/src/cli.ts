#!/usr/bin/env -S node --import tsx

/**
 * CLI entry point for the tapline command
 */

// Load environment variables from .env file
import 'dotenv/config';

import { start } from './start.js';

start().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  }
);
