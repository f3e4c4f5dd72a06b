import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import {
  getErrorInfo,
  type AcquireOptions,
  type AttemptRecord,
  type CloakingReport,
  type ErrorCode,
} from '@cloakscope/shared';
import { extractSeoData, isValidUrl, normalizeUrl } from '@cloakscope/extractor';
import { AcquisitionService } from '../acquisition/acquisition.service';
import { AnalyzeRequestDto } from './dto/analyze-request.dto';
import type { AnalyzeResponse } from './analyze.types';

function describeRedirects(url: string, finalUrl: string): string[] {
  if (!isValidUrl(finalUrl) || normalizeUrl(finalUrl) === url) {
    return [];
  }
  return [`${url} -> ${finalUrl}`];
}

/**
 * The last attempt that failed with a code explains the outcome better than
 * the exhaustion code itself
 */
function decisiveErrorCode(attempts: AttemptRecord[], fallback: ErrorCode): ErrorCode {
  for (let i = attempts.length - 1; i >= 0; i--) {
    const code = attempts[i].errorCode;
    if (code !== null) return code;
  }
  return fallback;
}

@Injectable()
export class AnalyzeService {
  private readonly logger = new Logger(AnalyzeService.name);

  constructor(private readonly acquisition: AcquisitionService) {}

  /**
   * Fetch the crawler's version of a page, extract its SEO metadata and
   * optionally compare it with what a visitor gets
   */
  async analyze(request: AnalyzeRequestDto): Promise<AnalyzeResponse> {
    const { url, detectCloaking = false, includeHtml = false } = request;
    const options: AcquireOptions = {
      skipTrustedProxy: request.skipTrustedProxy,
      preferCloakedProvenance: request.preferCloakedProvenance,
      bypassCache: request.bypassCache,
    };

    this.logger.log(`Analyze request: url=${url}, cloaking=${detectCloaking}`);

    const crawler = await this.acquisition.acquire(url, 'crawler', options);
    if (!crawler.success) {
      if (crawler.errorCode === 'INVALID_URL') {
        throw new BadRequestException(crawler.error);
      }
      this.logger.warn(`Crawler acquisition failed for ${url}: ${crawler.error}`);
      return {
        success: false,
        url,
        error: crawler.error,
        errorCode: crawler.errorCode,
        recommendation: getErrorInfo(decisiveErrorCode(crawler.attempts, crawler.errorCode))?.recommendation ?? null,
        fetchTimeMs: crawler.elapsedMs,
        attempts: crawler.attempts,
      };
    }

    let cloaking: CloakingReport | null = null;
    if (detectCloaking) {
      const visitor = await this.acquisition.acquire(url, 'visitor', { bypassCache: options.bypassCache });
      if (visitor.success) {
        cloaking = this.acquisition.compare(crawler.html, visitor.html);
        this.logger.log(`Cloaking ${cloaking.detected ? 'detected' : 'not detected'} for ${url}`);
      } else {
        this.logger.warn(`Visitor acquisition failed for ${url}: ${visitor.error}`);
      }
    }

    return {
      success: true,
      url: crawler.url,
      finalUrl: crawler.finalUrl,
      redirects: describeRedirects(crawler.url, crawler.finalUrl),
      seoData: extractSeoData(crawler.html),
      cloaking,
      strategy: crawler.strategy,
      cloakedProvenance: crawler.cloakedProvenance,
      cached: crawler.cached,
      fetchTimeMs: crawler.elapsedMs,
      attempts: crawler.attempts,
      ...(includeHtml ? { html: crawler.html } : {}),
    };
  }
}
