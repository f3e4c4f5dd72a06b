// Strategy adapter contract shared by every acquisition technique
import type { ErrorCode, StrategyId, StrategyTag } from '@cloakscope/shared';

export interface RawSuccess {
  ok: true;
  html: string;
  httpStatus: number | null;
  finalUrl: string;
  elapsedMs: number;
}

export interface RawFailure {
  ok: false;
  error: string;
  errorCode: ErrorCode;
  httpStatus: number | null;
  elapsedMs: number;
}

/**
 * Result of one adapter attempt. Adapters convert their own failures into a
 * RawFailure instead of throwing.
 */
export type RawResult = RawSuccess | RawFailure;

export interface StrategyDescriptor {
  id: StrategyId;
  label: string;
  tags: StrategyTag[];
  /** True only for channels origin servers trust as genuine crawler traffic */
  cloakedProvenance: boolean;
  /** Per-attempt budget; the engine default applies when omitted */
  timeoutMs?: number;
}

export interface StrategyFetchContext {
  signal: AbortSignal;
  timeoutMs: number;
}

export interface StrategyAdapter {
  readonly descriptor: StrategyDescriptor;
  isAvailable(): boolean | Promise<boolean>;
  fetch(url: string, ctx: StrategyFetchContext): Promise<RawResult>;
}

export function rawSuccess(
  html: string,
  httpStatus: number | null,
  finalUrl: string,
  startTime: number,
): RawSuccess {
  return { ok: true, html, httpStatus, finalUrl, elapsedMs: Date.now() - startTime };
}

export function rawFailure(
  error: string,
  errorCode: ErrorCode,
  startTime: number,
  httpStatus: number | null = null,
): RawFailure {
  return { ok: false, error, errorCode, httpStatus, elapsedMs: Date.now() - startTime };
}
