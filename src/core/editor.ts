/**
 * Dossier - Editor
 *
 * Turns the category briefings into the final report in two passes:
 * 1. compileContent - one completion merging all briefings, with the
 *    rendered references appended verbatim
 * 2. contentSweep - a streamed completion that rewrites the draft into the
 *    canonical structure, forwarding text to the observer as it arrives
 *
 * Each pass degrades instead of failing: compilation falls back to the raw
 * briefings, the sweep falls back to its input.
 */

import { ChunkBuffer } from './chunk-buffer.js';
import type { CompletionBackend } from './completion.js';
import {
  buildCompilePrompt,
  buildSweepPrompt,
  COMPILE_SYSTEM_PROMPT,
  SWEEP_SYSTEM_PROMPT,
} from './prompts.js';
import { formatReferencesSection, type ReferenceFormatter } from './references.js';
import { checkReportStructure, formatStructureIssues } from './report-structure.js';
import { emitStatus } from './status.js';
import { buildResearchContext, briefingKey } from './briefing.js';
import type { Category, ResearchContext, ResearchState } from './types.js';

export interface EditorOptions {
  backend: CompletionBackend;
  model: string;
  formatReferences?: ReferenceFormatter;
}

/** Order of sections in the compiled report. */
export const REPORT_CATEGORY_ORDER: readonly Category[] = ['company', 'industry', 'financial', 'revenue'];

// ============================================================================
// Compilation
// ============================================================================

/** Briefings present in state, in report order. */
export function collectBriefings(state: ResearchState): Partial<Record<Category, string>> {
  const briefings: Partial<Record<Category, string>> = {};
  for (const category of REPORT_CATEGORY_ORDER) {
    const content = state[briefingKey(category)];
    if (content) {
      briefings[category] = content;
    }
  }
  return briefings;
}

export function combineBriefings(briefings: Partial<Record<Category, string>>): string {
  return REPORT_CATEGORY_ORDER.map((category) => briefings[category])
    .filter((content): content is string => Boolean(content))
    .join('\n\n');
}

/**
 * Merge briefings into one draft report. On backend failure the raw
 * concatenation of the briefings is returned instead.
 */
export async function compileContent(
  state: ResearchState,
  briefings: Partial<Record<Category, string>>,
  context: ResearchContext,
  options: EditorOptions
): Promise<string> {
  const combinedContent = combineBriefings(briefings);

  let referenceText = '';
  const references = state.references ?? [];
  if (references.length > 0) {
    console.error(`[editor] Found ${references.length} references to add during compilation`);
    const format = options.formatReferences ?? formatReferencesSection;
    referenceText = format(references, state.reference_info ?? {}, state.reference_titles ?? {});
  }

  try {
    const response = await options.backend.complete({
      model: options.model,
      messages: [
        { role: 'system', content: COMPILE_SYSTEM_PROMPT },
        { role: 'user', content: buildCompilePrompt(context.company, context.industry, combinedContent) },
      ],
      temperature: 0,
    });

    const initialReport = response.trim();
    return referenceText ? `${initialReport}\n\n${referenceText}` : initialReport;
  } catch (error) {
    console.error('[editor] Error in initial compilation:', error);
    return combinedContent.trim();
  }
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Rewrite the draft into the canonical structure. Streamed text is forwarded
 * as report_chunk events; on backend failure the draft is returned unchanged.
 */
export async function contentSweep(content: string, context: ResearchContext, options: EditorOptions): Promise<string> {
  const buffer = new ChunkBuffer((chunk) =>
    emitStatus(context, 'report_chunk', 'Formatting final report', { chunk, step: 'Editor' })
  );

  try {
    const stream = options.backend.stream({
      model: options.model,
      messages: [
        { role: 'system', content: SWEEP_SYSTEM_PROMPT },
        { role: 'user', content: buildSweepPrompt(context.company, content) },
      ],
      temperature: 0,
    });

    for await (const fragment of stream) {
      await buffer.push(fragment);
    }
    await buffer.flush();

    return buffer.text.trim();
  } catch (error) {
    console.error('[editor] Error in formatting:', error);
    return content.trim();
  }
}

// ============================================================================
// Editor Flow
// ============================================================================

async function editReport(
  state: ResearchState,
  briefings: Partial<Record<Category, string>>,
  context: ResearchContext,
  options: EditorOptions
): Promise<string> {
  await emitStatus(context, 'processing', 'Compiling initial research report', { step: 'Editor', substep: 'compilation' });

  const editedReport = await compileContent(state, briefings, context, options);
  if (!editedReport) {
    console.error('[editor] Initial compilation failed');
    return '';
  }

  await emitStatus(context, 'processing', 'Cleaning up and organizing report', { step: 'Editor', substep: 'cleanup' });
  await emitStatus(context, 'processing', 'Formatting final report', { step: 'Editor', substep: 'format' });

  const finalReport = await contentSweep(editedReport, context, options);
  if (!finalReport) {
    console.error('[editor] Final report is empty!');
    return '';
  }
  console.error(`[editor] Final report compiled with ${finalReport.length} characters`);

  const structure = checkReportStructure(finalReport, context.company);
  if (!structure.ok) {
    console.error(`[editor] Final report deviates from the canonical structure:\n${formatStructureIssues(structure.issues)}`);
  }

  state.report = finalReport;
  state.status = 'editor_complete';
  state.editor = { ...state.editor, report: finalReport };

  await emitStatus(context, 'editor_complete', 'Research report completed', {
    step: 'Editor',
    report: finalReport,
    company: context.company,
    is_final: true,
    status: 'completed',
  });

  return finalReport;
}

/**
 * Compile the briefings in state into the final report. Always resolves with
 * the state; when nothing could be produced `report` is left unset and the
 * run's message log says why.
 */
export async function compileBriefings(state: ResearchState, options: EditorOptions): Promise<ResearchState> {
  const context = buildResearchContext(state);

  await emitStatus(context, 'processing', `Starting report compilation for ${context.company}`, {
    step: 'Editor',
    substep: 'initialization',
  });

  const msg = [`Compiling final report for ${context.company}...`];

  await emitStatus(context, 'processing', 'Collecting section briefings', {
    step: 'Editor',
    substep: 'collecting_briefings',
  });

  const briefings = collectBriefings(state);
  for (const category of REPORT_CATEGORY_ORDER) {
    const content = briefings[category];
    if (content) {
      msg.push(`Found ${category} briefing (${content.length} characters)`);
    } else {
      msg.push(`No ${category} briefing available`);
      console.error(`[editor] Missing state key: ${briefingKey(category)}`);
    }
  }

  if (Object.keys(briefings).length === 0) {
    msg.push('\nNo briefing sections available to compile');
    console.error('[editor] No briefings found in state');
  } else {
    try {
      const report = await editReport(state, briefings, context, options);
      if (report) {
        console.error(`[editor] Successfully compiled report with ${report.length} characters`);
      } else {
        msg.push('\nReport compilation produced no content');
      }
    } catch (error) {
      console.error('[editor] Error during report compilation:', error);
      msg.push(`\nReport compilation failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  state.messages.push(msg.join('\n'));
  return state;
}
