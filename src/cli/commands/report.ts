/**
 * Report CLI Command
 *
 * Runs the full pipeline over a research state file.
 */

import type { Command } from 'commander';
import { randomUUID } from 'crypto';
import { writeFile } from 'fs/promises';

import { c } from '../colors.js';
import { ConsoleStatusChannel } from '../status-printer.js';
import { exitWithError } from '../helpers.js';

interface ReportCommandOptions {
  out?: string;
  stateOut?: string;
  jobId?: string;
  stream?: boolean;
  events?: string;
  quiet?: boolean;
}

export function registerReportCommand(program: Command): void {
  program
    .command('report')
    .description('Generate a company research report from a research state file')
    .argument('<state>', 'Path to the research state JSON (curated datasets, references)')
    .option('-o, --out <file>', 'Write the final report to a file instead of stdout')
    .option('--state-out <file>', 'Write the final research state as JSON')
    .option('--job-id <id>', 'Job id attached to status events')
    .option('--stream', 'Stream report text to stdout while it is formatted')
    .option('--events <file>', 'Append status events to a JSON Lines file')
    .option('-q, --quiet', 'Only print the report')
    .action(async (statePath: string, options: ReportCommandOptions) => {
      const { loadDossierConfig } = await import('../../core/config.js');
      const { createCompletionBackend } = await import('../../core/completion.js');
      const { loadResearchState, serializeResearchState } = await import('../../core/state.js');
      const { runReportPipeline } = await import('../../core/pipeline.js');

      const channel = new ConsoleStatusChannel({
        streamReport: options.stream && !options.out,
        quiet: options.quiet,
        eventsFile: options.events,
      });

      try {
        const config = await loadDossierConfig();
        const backend = createCompletionBackend(config);
        const state = await loadResearchState(statePath, channel);
        state.job_id = options.jobId || state.job_id || randomUUID();

        if (!options.quiet) {
          console.error(`\n${c.title(`Dossier: ${state.company}`)}`);
          console.error(c.dim(`Job ${state.job_id} | ${backend.provider} | ${config.briefingModel} / ${config.editorModel}\n`));
        }

        await runReportPipeline(state, { backend, config });

        if (options.stateOut) {
          await writeFile(options.stateOut, serializeResearchState(state) + '\n');
        }

        if (!state.report) {
          if (!options.quiet) {
            console.error(`\n${state.messages.join('\n')}`);
          }
          exitWithError(`No report produced for ${state.company}`);
        }

        if (options.out) {
          await writeFile(options.out, state.report + '\n');
          if (!options.quiet) {
            console.error(c.success(`\nReport written to ${options.out}`));
          }
        } else if (channel.hasStreamed) {
          process.stdout.write('\n');
        } else {
          console.log(state.report);
        }
      } catch (error) {
        exitWithError(error instanceof Error ? error.message : String(error));
      }
    });
}
