/**
 * Dossier - Reference Formatting
 *
 * Default renderer for the report's references section. The editor only
 * depends on the ReferenceFormatter signature.
 */

import { REFERENCES_HEADING } from './prompts.js';
import type { ReferenceInfo } from './types.js';

export type ReferenceFormatter = (
  references: string[],
  referenceInfo: Record<string, ReferenceInfo>,
  referenceTitles: Record<string, string>
) => string;

/** Hostname without a leading "www.", or null when the string is not a URL. */
export function hostnameOf(url: string): string | null {
  try {
    return new URL(url).hostname.replace(/^www\./, '');
  } catch {
    return null;
  }
}

/**
 * Render references as an MLA-style bullet list:
 * `* Title. Website. https://...`
 * Duplicate URLs are listed once, in first-seen order.
 */
export const formatReferencesSection: ReferenceFormatter = (references, referenceInfo, referenceTitles) => {
  const seen = new Set<string>();
  const lines: string[] = [];

  for (const raw of references) {
    const url = raw.trim();
    if (!url || seen.has(url)) continue;
    seen.add(url);

    const info = referenceInfo[url] ?? {};
    const host = hostnameOf(url);
    const title = referenceTitles[url] || info.title || host || url;
    const website = info.website || info.domain || host;

    const parts = [title];
    if (website && website !== title) {
      parts.push(website);
    }
    lines.push(`* ${parts.join('. ')}. ${url}`);
  }

  if (lines.length === 0) return '';
  return `## ${REFERENCES_HEADING}\n\n${lines.join('\n')}`;
};
