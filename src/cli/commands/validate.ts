/**
 * Validate CLI Command
 *
 * Checks a Markdown report against the canonical report structure.
 */

import type { Command } from 'commander';
import { readFile } from 'fs/promises';

import { c } from '../colors.js';
import { exitWithError } from '../helpers.js';

interface ValidateCommandOptions {
  company: string;
  json?: boolean;
}

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Check a report against the canonical heading and formatting rules')
    .argument('<report>', 'Path to the Markdown report')
    .requiredOption('-c, --company <name>', 'Company the report is about')
    .option('--json', 'Output raw JSON')
    .action(async (reportPath: string, options: ValidateCommandOptions) => {
      const { checkReportStructure, formatStructureIssues } = await import('../../core/report-structure.js');

      let markdown: string;
      try {
        markdown = await readFile(reportPath, 'utf-8');
      } catch (error) {
        exitWithError(`Cannot read ${reportPath}: ${error instanceof Error ? error.message : String(error)}`);
      }

      const result = checkReportStructure(markdown, options.company);

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else if (result.ok) {
        console.log(c.success(`${reportPath}: structure OK (${result.sections.length} sections)`));
      } else {
        console.log(c.warning(`${reportPath}: ${result.issues.length} issue(s)`));
        console.log(formatStructureIssues(result.issues));
      }

      if (!result.ok) {
        process.exitCode = 1;
      }
    });
}
