/**
 * CLI Helper Functions
 *
 * Shared utilities for CLI commands.
 */

import { existsSync, readFileSync } from 'fs';
import { parse } from 'dotenv';

import { c } from './colors.js';

/** Print an error and exit with status 1. */
export function exitWithError(message: string): never {
  console.error(c.error(message));
  process.exit(1);
}

/**
 * Load a .env file into process.env without dotenv's own logging. Existing
 * variables win unless override is set.
 */
export function loadEnvFile(filePath: string, override = false): void {
  if (!existsSync(filePath)) return;
  try {
    const parsed = parse(readFileSync(filePath, 'utf-8'));
    for (const [key, value] of Object.entries(parsed)) {
      if (override || process.env[key] === undefined) {
        process.env[key] = value;
      }
    }
  } catch (error) {
    console.error(`[env] Ignoring unreadable ${filePath}:`, error);
  }
}
