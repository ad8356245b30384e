/**
 * Dossier - Research State Input
 *
 * Validates a research state read from JSON (the curated datasets and
 * reference metadata produced upstream) and turns it into a ResearchState.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';

import { ConfigError, formatIssues } from './config.js';
import type { ResearchState, StatusChannel } from './types.js';

const documentSchema = z
  .object({
    url: z.string().optional(),
    title: z.string().optional(),
    content: z.string().optional(),
    raw_content: z.string().nullish().transform((v) => v ?? undefined),
    query: z.string().optional(),
    evaluation: z
      .object({ overall_score: z.union([z.number(), z.string()]).nullish() })
      .passthrough()
      .optional(),
  })
  .passthrough();

const datasetSchema = z.union([z.record(documentSchema), z.array(documentSchema)]);

const referenceInfoSchema = z
  .object({
    title: z.string().optional(),
    website: z.string().optional(),
    domain: z.string().optional(),
    query: z.string().optional(),
    score: z.number().optional(),
  })
  .passthrough();

export const researchStateSchema = z.object({
  company: z.string().min(1),
  industry: z.string().optional(),
  hq_location: z.string().optional(),
  company_url: z.string().optional(),
  job_id: z.string().optional(),

  curated_company_data: datasetSchema.optional(),
  curated_industry_data: datasetSchema.optional(),
  curated_financial_data: datasetSchema.optional(),
  curated_revenue_data: datasetSchema.optional(),

  company_briefing: z.string().optional(),
  industry_briefing: z.string().optional(),
  financial_briefing: z.string().optional(),
  revenue_briefing: z.string().optional(),

  references: z.array(z.string()).optional(),
  reference_info: z.record(referenceInfoSchema).optional(),
  reference_titles: z.record(z.string()).optional(),

  messages: z.array(z.string()).default([]),
});

export type ResearchStateInput = z.input<typeof researchStateSchema>;

/** Validate raw input. Throws ConfigError listing every problem. */
export function parseResearchState(raw: unknown, statusChannel?: StatusChannel): ResearchState {
  const parsed = researchStateSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid research state:\n${formatIssues(parsed.error)}`);
  }
  return { ...parsed.data, status_channel: statusChannel };
}

export async function loadResearchState(filePath: string, statusChannel?: StatusChannel): Promise<ResearchState> {
  const content = await readFile(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseResearchState(raw, statusChannel);
}

/** The state as JSON, without the live status channel. */
export function serializeResearchState(state: ResearchState): string {
  const { status_channel: _channel, ...rest } = state;
  return JSON.stringify(rest, null, 2);
}
