/**
 * Dossier - Prompt Templates
 *
 * Templates are plain text with {company}, {industry} and {hq_location}
 * placeholders. Business rules in them (merging same-month funding rounds,
 * no ranges) are instructions to the model; nothing here enforces them.
 * Any template can be replaced from the `templates` section of config.json.
 */

import type { TemplateOverrides } from './config.js';
import { isCategory, type ResearchContext } from './types.js';

// ============================================================================
// Report Structure
// ============================================================================

export const REPORT_SECTIONS = [
  'Company Overview',
  'Industry Overview',
  'Financial Overview',
  'Revenue Mix Overview',
  'References',
] as const;

export const REFERENCES_HEADING = REPORT_SECTIONS[4];

export function reportTitle(company: string): string {
  return `${company} Research Report`;
}

// ============================================================================
// Briefing Templates
// ============================================================================

export type TemplateName = keyof Required<TemplateOverrides>;

export const BRIEFING_TEMPLATES: Record<TemplateName, string> = {
  company: `Create a concise company briefing for {company}, a company in the {industry} industry.
Key requirements:
1. Open with: "{company} is a [what type of company] that [does what] for [whom]"
2. Structure the briefing with exactly these headings and bullet points:

### Core Products/Services
* List distinct products or features
* Include only verified technical capabilities

### Leadership Team
* List key leadership team members
* Include their roles and professional background

### Target Market
* List specific target audiences
* List verified use cases
* List confirmed customers/partners

### Key Differentiators
* List unique features or characteristics
* List proven advantages

### Business Model
* Describe how products/services are priced
* List sales/distribution channels

3. Each bullet must be a single, complete, verifiable fact
4. Never use phrases like "no information found" or "data not available"
5. Bullet points only; no paragraphs
6. Provide only the briefing, with no explanations or commentary.`,

  industry: `Create an industry-focused briefing for {company}, a company in the {industry} industry.
Key requirements:
1. Structure the briefing with exactly these headings and bullet points:

### Market Overview
* State the market segment {company} operates in
* Give the market size with its year
* Give the market growth rate with its year range

### Direct Competitors
* List direct competitors by name
* List specific competing products
* List their market positioning

### Competitive Advantages
* List unique technical features
* List proven advantages

### Market Challenges
* List specific, verifiable challenges

2. Each bullet must be a specific, verifiable news event
3. Bullet points only; no paragraphs
4. Never use phrases like "no information found" or "data not available"
5. Provide only the briefing, with no explanations.`,

  financial: `Create a financial briefing for {company}, a company in the {industry} industry.
Key requirements:
1. Structure the briefing with these headings and bullet points:

### Funding & Investment
* Total funding amount with its date
* Each funding round with its date
* Names of participating investors

### Revenue Model
* Describe product/service pricing where applicable

2. Include specific figures wherever possible
3. Bullet points only; no paragraphs
4. Never use phrases like "no information found" or "data not available"
5. Never list the same funding round twice; rounds in the same month count as one round
6. Never give funding ranges. Judge from the material and state one specific figure
7. Provide only the briefing, with no explanations or commentary.`,

  revenue: `Create a briefing for {company}, a company in the {industry} industry, on its revenue by business line and each line's share of total revenue.
Key requirements:
1. Structure the briefing with these headings and bullet points:

### Revenue Breakdown
* List revenue and share of total revenue by business segment or product line
* Where available, note the revenue trend of each line (by year or quarter)

### Latest Financial Report Highlights
* Cite the core revenue figures from the most recent financial report
* Include total revenue and year-over-year growth
* Include regional revenue distribution where applicable

2. Include specific figures and dates wherever possible
3. Bullet points only; no paragraphs
4. Never use phrases like "no information found" or "data not available"
5. Never give revenue ranges. Judge from the material and state one specific figure
6. Provide only the briefing, with no explanations or commentary.`,

  generic: `Write a focused, insightful research briefing on {company} in the {industry} industry, based on the documents provided.`,
};

export function fillTemplate(template: string, context: Pick<ResearchContext, 'company' | 'industry' | 'hq_location'>): string {
  return template
    .replace(/\{company\}/g, () => context.company)
    .replace(/\{industry\}/g, () => context.industry)
    .replace(/\{hq_location\}/g, () => context.hq_location);
}

/** Resolve the template for a category, falling back to the generic one for unknown categories. */
export function briefingTemplate(category: string, overrides: TemplateOverrides = {}): string {
  const name: TemplateName = isCategory(category) ? category : 'generic';
  return overrides[name] ?? BRIEFING_TEMPLATES[name];
}

export function buildBriefingPrompt(instructions: string, documents: string): string {
  return `${instructions}
Analyze the following documents and extract the key information. Output only the briefing content, with no explanations or commentary:
${documents}

`;
}

// ============================================================================
// Editor Prompts
// ============================================================================

export const COMPILE_SYSTEM_PROMPT =
  'You are an expert report editor who merges multiple research briefings into a clear, comprehensive company research report.';

export function buildCompilePrompt(company: string, industry: string, combinedContent: string): string {
  return `You are writing a comprehensive research report on ${company}.

These are the research briefings collected so far:
${combinedContent}

From this material, write a complete and focused research report. ${company} is a company in the ${industry} industry.

Writing requirements:
1. Merge all sections into one coherent narrative without repetition;
2. Keep the important information from every section;
3. Organize the content logically and drop transitional explanations or commentary;
4. Use clear section headings and structure.

Follow this document structure **exactly**:

# ${reportTitle(company)}

## ${REPORT_SECTIONS[0]}
[Company content, with ### subsections as needed]

## ${REPORT_SECTIONS[1]}
[Industry content, with ### subsections as needed]

## ${REPORT_SECTIONS[2]}
[Financial content, with ### subsections as needed]

## ${REPORT_SECTIONS[3]}
[Revenue mix content, with ### subsections as needed]

Return the complete report in **clean Markdown**, with **no explanations or commentary**.
`;
}

export const SWEEP_SYSTEM_PROMPT =
  'You are an expert Markdown formatter who unifies document structure so that formatting is clean, consistent and standard.';

export function buildSweepPrompt(company: string, content: string): string {
  return `You are an expert briefing editor. You will receive a report about ${company}.
Current report:
${content}

Process the report as follows:

1. Remove redundant or repeated information
2. Remove information unrelated to ${company}
3. Remove sections that are empty or lack substance
4. Remove all meta-commentary (for example "Here is the news...")

**Strictly follow this document structure:**

## ${REPORT_SECTIONS[0]}
[Company content with ### subheadings]

## ${REPORT_SECTIONS[1]}
[Industry content with ### subheadings]

## ${REPORT_SECTIONS[2]}
[Financial content with ### subheadings]

## ${REPORT_SECTIONS[3]}
[Revenue mix content with ### subheadings]

## ${REFERENCES_HEADING}
[References in MLA format; keep them exactly as they are and **do not change their formatting**]

**Critical rules:**
1. The document must start with the title "# ${reportTitle(company)}"
2. The document may use only these second-level (##) headings, in this order:
${REPORT_SECTIONS.map((section) => `   - ## ${section}`).join('\n')}
3. No other second-level (##) headings are allowed
4. Inside ${REPORT_SECTIONS.slice(0, 4).join(' / ')}, use only third-level (###) headings for subsections
5. Never use code blocks (\`\`\`)
6. Never leave more than one blank line between sections
7. Use "*" for every bullet point
8. Leave exactly one blank line before and after each section or list
9. Never change the formatting of the ${REFERENCES_HEADING} section
10. In ${REFERENCES_HEADING}, **never show a bare link (such as https://example.com/...)**. For each link, work out the page title or the most representative name from the link (or its path), then cite it with Markdown syntax [title](link). Wrong: https://example.com/blog/2025/04/market-update  Right: [Market update, April 2025](https://example.com/blog/2025/04/market-update)

Return the cleaned report in **perfect Markdown**, with no explanations or notes.
`;
}
