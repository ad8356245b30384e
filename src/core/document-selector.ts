/**
 * Dossier - Document Selection
 *
 * Ranks a category's documents by evaluation score and packs them into a
 * bounded block of prompt text.
 */

import type { CategoryDataset, ResearchDocument } from './types.js';
import { DEFAULT_MAX_DOC_LENGTH, DEFAULT_MAX_PROMPT_LENGTH } from './config.js';

export const TRUNCATION_MARKER = '... [content truncated]';
export const DOCUMENT_SEPARATOR = '\n' + '-'.repeat(40) + '\n';

export interface SelectionOptions {
  maxDocLength?: number;
  maxPromptLength?: number;
}

export interface DocumentSelection {
  blocks: string[];
  included: string[];             // Locators, in prompt order
  dropped: string[];              // Locators that did not fit the budget
  totalLength: number;
}

/** Normalize a dataset to (locator, document) pairs. */
export function toDocumentEntries(docs: CategoryDataset): Array<[string, ResearchDocument]> {
  if (Array.isArray(docs)) {
    return docs.map((doc, i) => [doc.url ?? `doc_${i}`, doc]);
  }
  return Object.entries(docs);
}

export function countDocuments(docs: CategoryDataset): number {
  return Array.isArray(docs) ? docs.length : Object.keys(docs).length;
}

/** Missing or unparseable scores rank as 0. */
export function scoreOf(doc: ResearchDocument): number {
  const raw = doc.evaluation?.overall_score;
  if (raw === undefined || raw === null) return 0;
  const score = typeof raw === 'number' ? raw : parseFloat(raw);
  return Number.isFinite(score) ? score : 0;
}

function formatBlock(doc: ResearchDocument, maxDocLength: number): string {
  let content = doc.raw_content || doc.content || '';
  if (content.length > maxDocLength) {
    content = content.slice(0, maxDocLength) + TRUNCATION_MARKER;
  }
  return `Title: ${doc.title || ''}\n\nContent: ${content}`;
}

/**
 * Select documents highest score first. Each document is truncated before it
 * is budgeted; the first block that would push the running total to the
 * budget ends selection and everything after it is dropped.
 */
export function selectDocuments(docs: CategoryDataset, options: SelectionOptions = {}): DocumentSelection {
  const { maxDocLength = DEFAULT_MAX_DOC_LENGTH, maxPromptLength = DEFAULT_MAX_PROMPT_LENGTH } = options;

  // Array.prototype.sort is stable, so equal scores keep their input order
  const ranked = toDocumentEntries(docs).sort((a, b) => scoreOf(b[1]) - scoreOf(a[1]));

  const blocks: string[] = [];
  const included: string[] = [];
  let totalLength = 0;
  let cutoff = ranked.length;

  for (let i = 0; i < ranked.length; i++) {
    const [locator, doc] = ranked[i];
    const block = formatBlock(doc, maxDocLength);
    if (totalLength + block.length >= maxPromptLength) {
      cutoff = i;
      break;
    }
    blocks.push(block);
    included.push(locator);
    totalLength += block.length;
  }

  return {
    blocks,
    included,
    dropped: ranked.slice(cutoff).map(([locator]) => locator),
    totalLength,
  };
}

/** Join selected blocks with the separator, fencing the first and last block too. */
export function joinBlocks(blocks: string[]): string {
  return `${DOCUMENT_SEPARATOR}${blocks.join(DOCUMENT_SEPARATOR)}${DOCUMENT_SEPARATOR}`;
}
