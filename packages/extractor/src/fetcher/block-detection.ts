// Block detection shared by every acquisition strategy
import { blockStatusToErrorCode, type BlockVerdict, type ErrorCode } from '@cloakscope/shared';
import type { RawResult } from './types';
import {
  BLOCKING_STATUS_CODES,
  CHALLENGE_PHRASES,
  BLOCKING_TITLES,
  TITLE_PATTERN,
} from './block-patterns';

export interface BlockSignal {
  verdict: BlockVerdict;
  /** e.g. `status:403`, `phrase:ray id`, `title:access denied` */
  signal: string | null;
  errorCode: ErrorCode | null;
}

export interface BlockDetectorOptions {
  extraChallengePhrases?: string[];
  extraBlockingTitles?: string[];
}

const PASS: BlockSignal = { verdict: 'success', signal: null, errorCode: null };

/**
 * Classifies a raw fetch result as genuine content, a blocking response or a
 * challenge page. One instance is shared by all strategies.
 */
export class BlockDetector {
  private readonly statusCodes: ReadonlySet<number>;
  private readonly challengePhrases: readonly string[];
  private readonly blockingTitles: ReadonlySet<string>;

  constructor(options: BlockDetectorOptions = {}) {
    this.statusCodes = new Set(BLOCKING_STATUS_CODES);
    this.challengePhrases = [
      ...CHALLENGE_PHRASES,
      ...(options.extraChallengePhrases ?? []).map(p => p.toLowerCase()),
    ];
    this.blockingTitles = new Set([
      ...BLOCKING_TITLES,
      ...(options.extraBlockingTitles ?? []).map(t => t.toLowerCase()),
    ]);
  }

  classify(raw: RawResult): BlockVerdict {
    return this.inspect(raw).verdict;
  }

  inspect(raw: RawResult): BlockSignal {
    // Status-based detection applies to failures too (e.g. an API relaying a 403)
    if (raw.httpStatus !== null && this.statusCodes.has(raw.httpStatus)) {
      return {
        verdict: 'blocked',
        signal: `status:${raw.httpStatus}`,
        errorCode: blockStatusToErrorCode(raw.httpStatus),
      };
    }

    if (!raw.ok) {
      return PASS;
    }

    return this.inspectHtml(raw.html);
  }

  /**
   * Content-only check, used by browser strategies while waiting for a challenge to clear
   */
  isChallenge(html: string): boolean {
    return this.findChallengePhrase(html.toLowerCase()) !== null;
  }

  private inspectHtml(html: string): BlockSignal {
    const lower = html.toLowerCase();

    const phrase = this.findChallengePhrase(lower);
    if (phrase) {
      return { verdict: 'challenged', signal: `phrase:${phrase}`, errorCode: 'BLOCK_CHALLENGE_PAGE' };
    }

    const title = extractTitle(lower);
    if (title !== null && this.blockingTitles.has(title)) {
      return { verdict: 'blocked', signal: `title:${title}`, errorCode: 'BLOCK_ERROR_TITLE' };
    }

    return PASS;
  }

  private findChallengePhrase(lowerHtml: string): string | null {
    return this.challengePhrases.find(phrase => lowerHtml.includes(phrase)) ?? null;
  }
}

function extractTitle(html: string): string | null {
  const match = TITLE_PATTERN.exec(html);
  if (!match || match[1] === undefined) return null;
  return match[1].replace(/\s+/g, ' ').trim();
}
