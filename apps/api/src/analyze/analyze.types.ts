import type {
  AttemptRecord,
  CloakingReport,
  ErrorCode,
  SeoData,
  StrategyId,
} from '@cloakscope/shared';

export interface AnalyzeSuccess {
  success: true;
  url: string;
  finalUrl: string;
  redirects: string[];
  seoData: SeoData;
  cloaking: CloakingReport | null;
  strategy: StrategyId;
  cloakedProvenance: boolean;
  cached: boolean;
  fetchTimeMs: number;
  attempts: AttemptRecord[];
  html?: string;
}

export interface AnalyzeFailure {
  success: false;
  url: string;
  error: string;
  errorCode: ErrorCode;
  recommendation: string | null;
  fetchTimeMs: number;
  attempts: AttemptRecord[];
}

export type AnalyzeResponse = AnalyzeSuccess | AnalyzeFailure;
