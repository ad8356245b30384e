#!/usr/bin/env node

/**
 * Dossier CLI
 *
 * Commands:
 * - report: Run the briefing and editor pipeline over a research state file
 * - validate: Check a report against the canonical structure
 * - config: Show or change settings
 */

import { Command } from 'commander';

import { loadEnvFile } from './cli/helpers.js';
import { registerReportCommand } from './cli/commands/report.js';
import { registerValidateCommand } from './cli/commands/validate.js';
import { registerConfigCommand } from './cli/commands/config.js';

// Load .env first, then .env.local (overrides)
loadEnvFile('.env');
loadEnvFile('.env.local', true);

const program = new Command();

program
  .name('dossier')
  .description('Company research reports from curated documents: category briefings, compiled and normalized')
  .version('0.1.0');

registerReportCommand(program);
registerValidateCommand(program);
registerConfigCommand(program);

await program.parseAsync();
