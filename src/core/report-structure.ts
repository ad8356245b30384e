/**
 * Dossier - Report Structure Check
 *
 * Verifies a Markdown report against the canonical layout:
 * - one `#` title naming the company, first in the document
 * - exactly the five `##` sections, in order
 * - only `###` subsections, and only inside the first four sections
 * - no fenced code, no runs of blank lines, `*` bullets only
 * - no bare URLs in the references section
 */

import { REPORT_SECTIONS, REFERENCES_HEADING } from './prompts.js';

export interface StructureIssue {
  line?: number;                  // 1-based
  message: string;
}

export interface StructureReport {
  ok: boolean;
  issues: StructureIssue[];
  sections: string[];             // Level-2 headings in document order
}

const HEADING_RE = /^(#{1,6})\s+(.*?)\s*#*\s*$/;
const ALT_BULLET_RE = /^\s*([-+•])\s+/;
const MARKDOWN_LINK_RE = /\[[^\]]*\]\([^)]*\)/g;
const URL_RE = /https?:\/\//;

export function checkReportStructure(markdown: string, company: string): StructureReport {
  const issues: StructureIssue[] = [];
  const sections: string[] = [];
  const lines = markdown.split('\n');

  let titles = 0;
  let sawContent = false;
  let blankRun = 0;
  let currentSection: string | null = null;

  lines.forEach((raw, index) => {
    const line = raw.replace(/\r$/, '');
    const lineNo = index + 1;

    if (line.trim() === '') {
      blankRun++;
      if (blankRun === 2) {
        issues.push({ line: lineNo, message: 'More than one blank line in a row' });
      }
      return;
    }
    blankRun = 0;

    if (line.trimStart().startsWith('```')) {
      issues.push({ line: lineNo, message: 'Fenced code block' });
    }

    const heading = HEADING_RE.exec(line);
    if (heading) {
      const level = heading[1].length;
      const text = heading[2];

      if (level === 1) {
        titles++;
        if (sawContent || titles > 1) {
          issues.push({ line: lineNo, message: 'Title must be the only level-1 heading and come first' });
        }
        if (!text.includes(company)) {
          issues.push({ line: lineNo, message: `Title does not name "${company}"` });
        }
      } else if (level === 2) {
        sections.push(text);
        currentSection = text;
      } else if (level === 3) {
        if (currentSection === null) {
          issues.push({ line: lineNo, message: `Subsection "${text}" appears before any section` });
        } else if (currentSection === REFERENCES_HEADING) {
          issues.push({ line: lineNo, message: `Subsection "${text}" inside ${REFERENCES_HEADING}` });
        }
      } else {
        issues.push({ line: lineNo, message: `Level-${level} heading "${text}"; subsections must use ###` });
      }
    }

    const bullet = ALT_BULLET_RE.exec(line);
    if (bullet) {
      issues.push({ line: lineNo, message: `Bullet uses "${bullet[1]}" instead of "*"` });
    }

    if (currentSection === REFERENCES_HEADING && !heading) {
      if (URL_RE.test(line.replace(MARKDOWN_LINK_RE, ''))) {
        issues.push({ line: lineNo, message: 'Bare link in references; use [title](url)' });
      }
    }

    sawContent = true;
  });

  if (titles === 0) {
    issues.push({ message: 'Missing level-1 title' });
  }

  const expected: readonly string[] = REPORT_SECTIONS;
  for (const section of sections) {
    if (!expected.includes(section)) {
      issues.push({ message: `Unexpected section "## ${section}"` });
    }
  }
  for (const section of expected) {
    const count = sections.filter((s) => s === section).length;
    if (count === 0) {
      issues.push({ message: `Missing section "## ${section}"` });
    } else if (count > 1) {
      issues.push({ message: `Section "## ${section}" appears ${count} times` });
    }
  }
  const known = sections.filter((s) => expected.includes(s));
  const inOrder = known.every((s, i) => i === 0 || expected.indexOf(s) > expected.indexOf(known[i - 1]));
  if (!inOrder) {
    issues.push({ message: `Sections out of order: expected ${expected.join(', ')}` });
  }

  return { ok: issues.length === 0, issues, sections };
}

export function formatStructureIssues(issues: StructureIssue[]): string {
  return issues.map((issue) => (issue.line ? `line ${issue.line}: ${issue.message}` : issue.message)).join('\n');
}
