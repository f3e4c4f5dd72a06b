/**
 * Crawler vs visitor document comparison
 *
 * Two independent signals: a line diff over normalized markup, and a set
 * difference over SEO-relevant elements taken from the raw documents.
 */

import * as Diff from 'diff';
import type { CloakingReport, CloakingSignal } from '@cloakscope/shared';
import { createLogger } from '../utils/logger';

const logger = createLogger('[Comparator]');

// Markup that differs between any two loads of the same page
const VOLATILE_PATTERNS: RegExp[] = [
  /<script[^>]*>.*?<\/script>/gis,
  /<!--.*?-->/gs,
  /<noscript[^>]*>.*?<\/noscript>/gis,
  /data-[a-z-]+="[^"]*"/gi,
  /\bid="[^"]*"/gi,
  /\bclass="[^"]*"/gi,
];

const SEO_ELEMENT_PATTERNS: RegExp[] = [
  /<title[^>]*>.*?<\/title>/gis,
  /<meta[^>]*name=["']description["'][^>]*>/gis,
  /<meta[^>]*name=["']robots["'][^>]*>/gis,
  /<link[^>]*rel=["']canonical["'][^>]*>/gis,
  /<h1[^>]*>.*?<\/h1>/gis,
  /<link[^>]*rel=["']alternate["'][^>]*hreflang[^>]*>/gis,
];

export interface CloakingComparatorOptions {
  /** Unique lines a side needs before the line diff can trigger detection */
  absoluteLineThreshold?: number;
  /** Share of a side's lines that must be unique to it */
  relativeLineThreshold?: number;
  /** Cap on each element list in the report */
  maxElements?: number;
  /**
   * Edit distance at which the line diff gives up; unique lines are then
   * counted as a multiset difference
   */
  maxEditLength?: number;
}

export interface CompareOptions {
  /** Keep scripts, comments and volatile attributes in the line diff */
  strict?: boolean;
}

interface LineChange {
  value: string[];
  added?: boolean;
  removed?: boolean;
}

type DiffOptions = NonNullable<Parameters<typeof Diff.diffArrays>[2]> & { maxEditLength: number };

interface LineCounts {
  crawlerOnlyLines: number;
  visitorOnlyLines: number;
}

function countOccurrences(lines: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const line of lines) {
    counts.set(line, (counts.get(line) ?? 0) + 1);
  }
  return counts;
}

/**
 * Lines each side has more often than the other. A lower bound of the line
 * diff counts that ignores order.
 */
export function countUniqueLines(crawlerLines: string[], visitorLines: string[]): LineCounts {
  const crawlerCounts = countOccurrences(crawlerLines);
  const visitorCounts = countOccurrences(visitorLines);
  let crawlerOnlyLines = 0;
  let visitorOnlyLines = 0;

  for (const [line, count] of crawlerCounts) {
    crawlerOnlyLines += Math.max(0, count - (visitorCounts.get(line) ?? 0));
  }
  for (const [line, count] of visitorCounts) {
    visitorOnlyLines += Math.max(0, count - (crawlerCounts.get(line) ?? 0));
  }
  return { crawlerOnlyLines, visitorOnlyLines };
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Split markup into comparable lines: one per tag boundary or newline,
 * whitespace collapsed, blank lines dropped
 */
export function toLines(html: string, strict = false): string[] {
  const stripped = strict
    ? html
    : VOLATILE_PATTERNS.reduce((acc, pattern) => acc.replace(pattern, ''), html);

  return stripped
    .replace(/>\s*</g, '>\n<')
    .split('\n')
    .map(collapseWhitespace)
    .filter(line => line.length > 0);
}

/**
 * SEO elements of a raw document, deduplicated, in document order per pattern
 */
export function extractSeoElements(html: string): string[] {
  const elements = new Set<string>();
  for (const pattern of SEO_ELEMENT_PATTERNS) {
    for (const match of html.matchAll(pattern)) {
      elements.add(collapseWhitespace(match[0]));
    }
  }
  return [...elements];
}

export class CloakingComparator {
  private readonly absoluteLineThreshold: number;
  private readonly relativeLineThreshold: number;
  private readonly maxElements: number;
  private readonly maxEditLength: number;

  constructor(options: CloakingComparatorOptions = {}) {
    this.absoluteLineThreshold = options.absoluteLineThreshold ?? 50;
    this.relativeLineThreshold = options.relativeLineThreshold ?? 0.1;
    this.maxElements = options.maxElements ?? 10;
    this.maxEditLength = options.maxEditLength ?? 1000;
  }

  compare(crawlerHtml: string, visitorHtml: string, options: CompareOptions = {}): CloakingReport {
    const strict = options.strict ?? false;
    const crawlerLines = toLines(crawlerHtml, strict);
    const visitorLines = toLines(visitorHtml, strict);

    const { crawlerOnlyLines, visitorOnlyLines } = this.diffLines(crawlerLines, visitorLines);

    const crawlerElements = extractSeoElements(crawlerHtml);
    const visitorElements = extractSeoElements(visitorHtml);
    const crawlerSet = new Set(crawlerElements);
    const visitorSet = new Set(visitorElements);
    const crawlerOnlyElements = crawlerElements.filter(element => !visitorSet.has(element));
    const visitorOnlyElements = visitorElements.filter(element => !crawlerSet.has(element));

    const signals: CloakingSignal[] = [];
    if (crawlerOnlyElements.length > 0 || visitorOnlyElements.length > 0) {
      signals.push('seo_elements_differ');
    }
    if (this.exceedsThreshold(crawlerOnlyLines, crawlerLines.length)) {
      signals.push('crawler_lines_exceed_threshold');
    }
    if (this.exceedsThreshold(visitorOnlyLines, visitorLines.length)) {
      signals.push('visitor_lines_exceed_threshold');
    }

    return {
      detected: signals.length > 0,
      crawlerOnlyLines,
      visitorOnlyLines,
      crawlerLineCount: crawlerLines.length,
      visitorLineCount: visitorLines.length,
      crawlerOnlyElements: crawlerOnlyElements.slice(0, this.maxElements),
      visitorOnlyElements: visitorOnlyElements.slice(0, this.maxElements),
      signals,
    };
  }

  private diffLines(crawlerLines: string[], visitorLines: string[]): LineCounts {
    const options: DiffOptions = { maxEditLength: this.maxEditLength };
    // undefined once the edit distance passes maxEditLength
    const parts: LineChange[] | undefined = Diff.diffArrays(visitorLines, crawlerLines, options);

    if (!parts) {
      logger.debug(`Line diff exceeded ${this.maxEditLength} edits, counting unique lines instead`);
      return countUniqueLines(crawlerLines, visitorLines);
    }

    let crawlerOnlyLines = 0;
    let visitorOnlyLines = 0;
    for (const part of parts) {
      if (part.added) {
        crawlerOnlyLines += part.value.length;
      } else if (part.removed) {
        visitorOnlyLines += part.value.length;
      }
    }
    return { crawlerOnlyLines, visitorOnlyLines };
  }

  private exceedsThreshold(uniqueLines: number, totalLines: number): boolean {
    return uniqueLines > this.absoluteLineThreshold && uniqueLines > totalLines * this.relativeLineThreshold;
  }
}
