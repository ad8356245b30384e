/**
 * Dossier - Core Types
 *
 * One pipeline run threads a single ResearchState through three stages:
 * 1. Briefings - one generated text per research category
 * 2. Compilation - briefings merged into one draft report
 * 3. Normalization - the draft rewritten into the canonical report structure
 */

// ============================================================================
// Categories
// ============================================================================

export const CATEGORIES = ['company', 'industry', 'financial', 'revenue'] as const;

export type Category = (typeof CATEGORIES)[number];

export type CategoryDataField = `${Category}_data`;
export type CuratedDataKey = `curated_${Category}_data`;
export type BriefingKey = `${Category}_briefing`;

export function isCategory(value: string): value is Category {
  return CATEGORIES.some((category) => category === value);
}

// ============================================================================
// Documents - produced upstream, read-only here
// ============================================================================

export interface DocumentEvaluation {
  overall_score?: number | string | null;
  [key: string]: unknown;
}

export interface ResearchDocument {
  url?: string;
  title?: string;
  content?: string;
  raw_content?: string;           // Full page text; preferred over content
  query?: string;                 // Search query that surfaced the document
  evaluation?: DocumentEvaluation;
}

/** Documents keyed by source locator (URL or synthetic id), or a plain list. */
export type CategoryDataset = Record<string, ResearchDocument> | ResearchDocument[];

// ============================================================================
// Status Events
// ============================================================================

export type StatusTag =
  | 'processing'
  | 'briefing_start'
  | 'briefing_complete'
  | 'editor_complete'
  | 'report_chunk';

export interface StatusEvent {
  job_id: string;
  status: StatusTag;
  message: string;
  result: Record<string, unknown>;
}

/** Observer of a pipeline run. Delivery is fire-and-forget. */
export interface StatusChannel {
  sendStatusUpdate(event: StatusEvent): Promise<void> | void;
}

// ============================================================================
// Pipeline State
// ============================================================================

export interface ResearchContext {
  readonly company: string;
  readonly industry: string;
  readonly hq_location: string;
  readonly status_channel?: StatusChannel;
  readonly job_id?: string;
}

export interface Briefing<C extends string = Category> {
  category: C;
  content: string;                // Empty when generation failed or was skipped
}

export interface ReferenceInfo {
  title?: string;
  website?: string;
  domain?: string;
  query?: string;
  score?: number;
}

export interface ResearchState {
  company: string;
  industry?: string;
  hq_location?: string;
  company_url?: string;

  job_id?: string;
  status_channel?: StatusChannel;

  // Curated datasets (input)
  curated_company_data?: CategoryDataset;
  curated_industry_data?: CategoryDataset;
  curated_financial_data?: CategoryDataset;
  curated_revenue_data?: CategoryDataset;

  // Briefings (intermediate)
  company_briefing?: string;
  industry_briefing?: string;
  financial_briefing?: string;
  revenue_briefing?: string;
  briefings?: Partial<Record<Category, string>>;

  // References
  references?: string[];
  reference_info?: Record<string, ReferenceInfo>;
  reference_titles?: Record<string, string>;

  // Report (output)
  report?: string;
  status?: string;
  editor?: { report?: string };

  messages: string[];
}
