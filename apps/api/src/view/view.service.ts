import { BadGatewayException, BadRequestException, Injectable, Logger } from '@nestjs/common';
import type {
  AcquireOptions,
  AttemptRecord,
  ErrorCode,
  FetchOutcome,
  FetchSuccess,
  Identity,
  StrategyId,
} from '@cloakscope/shared';
import { extractSeoData } from '@cloakscope/extractor';
import { AcquisitionService } from '../acquisition/acquisition.service';
import type { AcquisitionFlagsDto } from '../analyze/dto/analyze-request.dto';
import { PreviewRequestDto } from './dto/preview-request.dto';
import { ViewRequestDto } from './dto/view-request.dto';

export interface ViewResponse {
  url: string;
  finalUrl: string;
  mode: Identity;
  strategy: StrategyId;
  cloakedProvenance: boolean;
  cached: boolean;
  fetchTimeMs: number;
  attempts: AttemptRecord[];
  html: string;
}

export type PreviewView =
  | {
      success: true;
      strategy: StrategyId;
      finalUrl: string;
      title: string | null;
      canonical: string | null;
      html: string;
      fetchTimeMs: number;
    }
  | {
      success: false;
      error: string;
      errorCode: ErrorCode;
      fetchTimeMs: number;
    };

export interface PreviewResponse {
  success: boolean;
  url: string;
  crawler: PreviewView;
  visitor: PreviewView | null;
  totalTimeMs: number;
}

function toPreviewView(outcome: FetchOutcome): PreviewView {
  if (!outcome.success) {
    return { success: false, error: outcome.error, errorCode: outcome.errorCode, fetchTimeMs: outcome.elapsedMs };
  }
  const { title, canonical } = extractSeoData(outcome.html);
  return {
    success: true,
    strategy: outcome.strategy,
    finalUrl: outcome.finalUrl,
    title,
    canonical,
    html: outcome.html,
    fetchTimeMs: outcome.elapsedMs,
  };
}

@Injectable()
export class ViewService {
  private readonly logger = new Logger(ViewService.name);

  constructor(private readonly acquisition: AcquisitionService) {}

  async view(request: ViewRequestDto): Promise<ViewResponse> {
    const mode = request.mode ?? 'crawler';
    const page = await this.fetch(request);
    return {
      url: page.url,
      finalUrl: page.finalUrl,
      mode,
      strategy: page.strategy,
      cloakedProvenance: page.cloakedProvenance,
      cached: page.cached,
      fetchTimeMs: page.elapsedMs,
      attempts: page.attempts,
      html: page.html,
    };
  }

  async raw(request: ViewRequestDto): Promise<string> {
    const page = await this.fetch(request);
    return page.html;
  }

  /**
   * Crawler and visitor views side by side, each with its title and canonical
   */
  async preview(request: PreviewRequestDto): Promise<PreviewResponse> {
    const startTime = Date.now();
    const includeVisitor = request.includeVisitor ?? true;

    const [crawler, visitor] = await Promise.all([
      this.acquisition.acquire(request.url, 'crawler', this.acquireOptions(request)),
      includeVisitor
        ? this.acquisition.acquire(request.url, 'visitor', { bypassCache: request.bypassCache })
        : Promise.resolve(null),
    ]);

    if (!crawler.success && crawler.errorCode === 'INVALID_URL') {
      throw new BadRequestException(crawler.error);
    }
    if (!crawler.success) {
      this.logger.warn(`Crawler preview failed for ${request.url}: ${crawler.error}`);
    }

    return {
      success: crawler.success,
      url: crawler.url,
      crawler: toPreviewView(crawler),
      visitor: visitor ? toPreviewView(visitor) : null,
      totalTimeMs: Date.now() - startTime,
    };
  }

  private acquireOptions(request: AcquisitionFlagsDto): AcquireOptions {
    return {
      skipTrustedProxy: request.skipTrustedProxy,
      preferCloakedProvenance: request.preferCloakedProvenance,
      bypassCache: request.bypassCache,
    };
  }

  private async fetch(request: ViewRequestDto): Promise<FetchSuccess> {
    const mode = request.mode ?? 'crawler';
    const result = await this.acquisition.acquire(request.url, mode, this.acquireOptions(request));

    if (result.success) {
      return result;
    }
    if (result.errorCode === 'INVALID_URL') {
      throw new BadRequestException(result.error);
    }
    this.logger.warn(`${mode} view failed for ${request.url}: ${result.error}`);
    throw new BadGatewayException({
      message: result.error,
      errorCode: result.errorCode,
      attempts: result.attempts,
    });
  }
}
