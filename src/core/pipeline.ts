/**
 * Dossier - Report Pipeline
 *
 * Briefings, then compilation and normalization, over one ResearchState.
 */

import { createBriefings } from './briefing.js';
import type { CompletionBackend } from './completion.js';
import type { ResolvedConfig } from './config.js';
import { compileBriefings } from './editor.js';
import type { ReferenceFormatter } from './references.js';
import type { ResearchState } from './types.js';

export interface PipelineOptions {
  backend: CompletionBackend;
  config: Pick<
    ResolvedConfig,
    'briefingModel' | 'editorModel' | 'briefingConcurrency' | 'maxDocLength' | 'maxPromptLength' | 'templates'
  >;
  formatReferences?: ReferenceFormatter;
}

/**
 * Run every stage in order. Stage failures degrade the report rather than
 * rejecting, so the returned state always carries whatever was produced.
 */
export async function runReportPipeline(state: ResearchState, options: PipelineOptions): Promise<ResearchState> {
  const { backend, config } = options;
  const startedAt = Date.now();

  await createBriefings(state, {
    backend,
    model: config.briefingModel,
    templates: config.templates,
    concurrency: config.briefingConcurrency,
    maxDocLength: config.maxDocLength,
    maxPromptLength: config.maxPromptLength,
  });

  await compileBriefings(state, {
    backend,
    model: config.editorModel,
    formatReferences: options.formatReferences,
  });

  const seconds = Math.round((Date.now() - startedAt) / 1000);
  console.error(
    state.report
      ? `[pipeline] Report for ${state.company} ready in ${seconds}s (${state.report.length} characters)`
      : `[pipeline] No report produced for ${state.company} after ${seconds}s`
  );
  return state;
}
