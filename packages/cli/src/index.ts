#!/usr/bin/env tsx
/**
 * docdrop CLI
 */

import { config as loadEnv } from 'dotenv';
import { createProgram } from './program.js';

// Load environment variables from .env (flags still win)
loadEnv();

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
