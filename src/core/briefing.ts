/**
 * Dossier - Briefings
 *
 * One briefing per research category, generated concurrently under a small
 * concurrency cap and written back into the pipeline state.
 */

import type { CompletionBackend } from './completion.js';
import type { TemplateOverrides } from './config.js';
import { DEFAULT_BRIEFING_CONCURRENCY } from './config.js';
import { countDocuments, joinBlocks, selectDocuments, type SelectionOptions } from './document-selector.js';
import { Semaphore } from './limiter.js';
import { briefingTemplate, buildBriefingPrompt, fillTemplate } from './prompts.js';
import { emitStatus } from './status.js';
import type {
  Briefing,
  BriefingKey,
  Category,
  CategoryDataset,
  CuratedDataKey,
  ResearchContext,
  ResearchState,
} from './types.js';

export interface BriefingOptions extends SelectionOptions {
  backend: CompletionBackend;
  model: string;
  templates?: TemplateOverrides;
  concurrency?: number;
}

/** Orchestrator visiting order. */
const BRIEFING_CATEGORIES: readonly Category[] = ['company', 'revenue', 'financial', 'industry'];

export function curatedKey(category: Category): CuratedDataKey {
  return `curated_${category}_data`;
}

export function briefingKey(category: Category): BriefingKey {
  return `${category}_briefing`;
}

export function buildResearchContext(state: ResearchState): ResearchContext {
  return {
    company: state.company || 'Unknown Company',
    industry: state.industry || 'Unknown',
    hq_location: state.hq_location || 'Unknown',
    status_channel: state.status_channel,
    job_id: state.job_id,
  };
}

// ============================================================================
// Generation
// ============================================================================

/**
 * Generate the briefing for one category. Never throws: a backend error or an
 * empty response yields a briefing with empty content.
 */
export async function generateCategoryBriefing<C extends string>(
  docs: CategoryDataset,
  category: C,
  context: ResearchContext,
  options: BriefingOptions
): Promise<Briefing<C>> {
  const totalDocs = countDocuments(docs);
  console.error(`[briefing] Generating ${category} briefing for ${context.company} using ${totalDocs} documents`);

  await emitStatus(context, 'briefing_start', `Generating ${category} briefing`, {
    step: 'Briefing',
    category,
    total_docs: totalDocs,
  });

  try {
    const instructions = fillTemplate(briefingTemplate(category, options.templates), context);
    const selection = selectDocuments(docs, options);
    if (selection.dropped.length > 0) {
      console.error(
        `[briefing] ${category}: ${selection.dropped.length} lower-scored document(s) left out, prompt budget reached at ${selection.totalLength} characters`
      );
    }
    const prompt = buildBriefingPrompt(instructions, joinBlocks(selection.blocks));

    const response = await options.backend.complete({
      model: options.model,
      messages: [{ role: 'user', content: prompt }],
    });
    const content = response.trim();
    if (!content) {
      console.error(`[briefing] Empty response from LLM for ${category} briefing`);
      return { category, content: '' };
    }

    await emitStatus(context, 'briefing_complete', `Completed ${category} briefing`, {
      step: 'Briefing',
      category,
    });

    return { category, content };
  } catch (error) {
    console.error(`[briefing] Error generating ${category} briefing:`, error);
    return { category, content: '' };
  }
}

// ============================================================================
// Orchestration
// ============================================================================

interface BriefingUpdate {
  category: Category;
  key: BriefingKey;
  content: string;
}

/**
 * Generate briefings for every category with curated documents and write
 * them into the state. Categories without documents get an empty briefing
 * and no generation. Resolves only after every task has settled.
 */
export async function createBriefings(state: ResearchState, options: BriefingOptions): Promise<ResearchState> {
  const context = buildResearchContext(state);

  await emitStatus(context, 'processing', 'Starting research briefings', { step: 'Briefing' });
  console.error(`[briefing] Creating section briefings for ${context.company}`);

  const limiter = new Semaphore(options.concurrency ?? DEFAULT_BRIEFING_CONCURRENCY);
  const tasks: Array<Promise<BriefingUpdate>> = [];

  for (const category of BRIEFING_CATEGORIES) {
    const key = briefingKey(category);
    const curated = state[curatedKey(category)];

    if (curated && countDocuments(curated) > 0) {
      console.error(`[briefing] Processing ${category}_data with ${countDocuments(curated)} documents`);
      tasks.push(
        limiter.run(async () => {
          const briefing = await generateCategoryBriefing(curated, category, context, options);
          return { category, key, content: briefing.content };
        })
      );
    } else {
      console.error(`[briefing] No data available for ${category}_data`);
      state[key] = '';
    }
  }

  const updates = await Promise.all(tasks);

  const briefings: Partial<Record<Category, string>> = {};
  let totalLength = 0;
  for (const update of updates) {
    state[update.key] = update.content;
    if (update.content) {
      briefings[update.category] = update.content;
      totalLength += update.content.length;
      console.error(`[briefing] Completed ${update.category}_data briefing (${update.content.length} characters)`);
    } else {
      console.error(`[briefing] Failed to generate briefing for ${update.category}_data`);
    }
  }

  if (tasks.length > 0) {
    console.error(
      `[briefing] Generated ${Object.keys(briefings).length}/${tasks.length} briefings with total length ${totalLength}`
    );
  }

  state.briefings = briefings;
  return state;
}
