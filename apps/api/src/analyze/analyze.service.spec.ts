import { BadRequestException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import type { CloakingReport, FetchOutcome } from '@cloakscope/shared';
import { AcquisitionService } from '../acquisition/acquisition.service';
import { AnalyzeService } from './analyze.service';

const crawlerHtml =
  '<html lang="en"><head><title>Shop</title><meta name="description" content="Buy things">' +
  '<link rel="canonical" href="https://example.com/shop"></head><body><h1>Shop</h1></body></html>';

const crawlerSuccess: FetchOutcome = {
  success: true,
  url: 'https://example.com/shop',
  finalUrl: 'https://example.com/shop',
  html: crawlerHtml,
  strategy: 'trusted-proxy',
  cloakedProvenance: true,
  cached: false,
  elapsedMs: 120,
  attempts: [{ strategy: 'trusted-proxy', outcome: 'accepted', httpStatus: 200, elapsedMs: 118, error: null, errorCode: null }],
};

const report: CloakingReport = {
  detected: true,
  crawlerOnlyLines: 1,
  visitorOnlyLines: 1,
  crawlerLineCount: 8,
  visitorLineCount: 8,
  crawlerOnlyElements: ['<title>Shop</title>'],
  visitorOnlyElements: ['<title>Store</title>'],
  signals: ['seo_elements_differ'],
};

describe('AnalyzeService', () => {
  let service: AnalyzeService;

  const mockAcquisitionService = {
    acquire: jest.fn(),
    compare: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AnalyzeService,
        {
          provide: AcquisitionService,
          useValue: mockAcquisitionService,
        },
      ],
    }).compile();

    service = module.get<AnalyzeService>(AnalyzeService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should return SEO data for the crawler version', async () => {
    mockAcquisitionService.acquire.mockResolvedValue(crawlerSuccess);

    const result = await service.analyze({ url: 'https://example.com/shop' });

    expect(mockAcquisitionService.acquire).toHaveBeenCalledWith('https://example.com/shop', 'crawler', {
      skipTrustedProxy: undefined,
      preferCloakedProvenance: undefined,
      bypassCache: undefined,
    });
    expect(mockAcquisitionService.compare).not.toHaveBeenCalled();
    expect(result).toEqual({
      success: true,
      url: 'https://example.com/shop',
      finalUrl: 'https://example.com/shop',
      redirects: [],
      seoData: {
        title: 'Shop',
        h1: 'Shop',
        description: 'Buy things',
        canonical: 'https://example.com/shop',
        htmlLang: 'en',
        robots: null,
        hreflang: [],
        alternateUrls: [],
      },
      cloaking: null,
      strategy: 'trusted-proxy',
      cloakedProvenance: true,
      cached: false,
      fetchTimeMs: 120,
      attempts: crawlerSuccess.attempts,
    });
  });

  it('should include HTML only when asked', async () => {
    mockAcquisitionService.acquire.mockResolvedValue(crawlerSuccess);

    const result = await service.analyze({ url: 'https://example.com/shop', includeHtml: true });

    expect(result).toHaveProperty('html', crawlerHtml);
  });

  it('should report a redirect when the final URL differs', async () => {
    mockAcquisitionService.acquire.mockResolvedValue({
      ...crawlerSuccess,
      finalUrl: 'https://www.example.com/shop/',
    });

    const result = await service.analyze({ url: 'https://example.com/shop' });

    expect(result).toHaveProperty('redirects', ['https://example.com/shop -> https://www.example.com/shop/']);
  });

  it('should not report a redirect for a trailing slash only', async () => {
    mockAcquisitionService.acquire.mockResolvedValue({
      ...crawlerSuccess,
      finalUrl: 'https://example.com/shop/',
    });

    const result = await service.analyze({ url: 'https://example.com/shop' });

    expect(result).toHaveProperty('redirects', []);
  });

  it('should compare with the visitor version when cloaking detection is on', async () => {
    const visitorHtml = crawlerHtml.replace('<title>Shop</title>', '<title>Store</title>');
    mockAcquisitionService.acquire
      .mockResolvedValueOnce(crawlerSuccess)
      .mockResolvedValueOnce({ ...crawlerSuccess, html: visitorHtml, strategy: 'browser-visitor' });
    mockAcquisitionService.compare.mockReturnValue(report);

    const result = await service.analyze({
      url: 'https://example.com/shop',
      detectCloaking: true,
      bypassCache: true,
    });

    expect(mockAcquisitionService.acquire).toHaveBeenNthCalledWith(2, 'https://example.com/shop', 'visitor', {
      bypassCache: true,
    });
    expect(mockAcquisitionService.compare).toHaveBeenCalledWith(crawlerHtml, visitorHtml);
    expect(result).toHaveProperty('cloaking', report);
  });

  it('should leave cloaking null when the visitor fetch fails', async () => {
    mockAcquisitionService.acquire.mockResolvedValueOnce(crawlerSuccess).mockResolvedValueOnce({
      success: false,
      url: 'https://example.com/shop',
      error: 'Blocked (status:403)',
      errorCode: 'ACQUISITION_EXHAUSTED',
      errorKind: 'exhaustion',
      elapsedMs: 900,
      attempts: [],
    });

    const result = await service.analyze({ url: 'https://example.com/shop', detectCloaking: true });

    expect(result.success).toBe(true);
    expect(result).toHaveProperty('cloaking', null);
    expect(mockAcquisitionService.compare).not.toHaveBeenCalled();
  });

  it('should return the failure when every strategy fails', async () => {
    const attempts = [
      {
        strategy: 'browser-direct',
        outcome: 'blocked',
        httpStatus: 403,
        elapsedMs: 800,
        error: 'Blocked (status:403)',
        errorCode: 'BLOCK_STATUS_403',
      },
      {
        strategy: 'managed-render',
        outcome: 'unavailable',
        httpStatus: null,
        elapsedMs: 0,
        error: null,
        errorCode: null,
      },
    ];
    mockAcquisitionService.acquire.mockResolvedValue({
      success: false,
      url: 'https://example.com/shop',
      error: 'Blocked (status:403)',
      errorCode: 'ACQUISITION_EXHAUSTED',
      errorKind: 'exhaustion',
      elapsedMs: 850,
      attempts,
    });

    const result = await service.analyze({ url: 'https://example.com/shop', detectCloaking: true });

    expect(result).toEqual({
      success: false,
      url: 'https://example.com/shop',
      error: 'Blocked (status:403)',
      errorCode: 'ACQUISITION_EXHAUSTED',
      recommendation: 'The website is denying this identity. A trusted-proxy strategy may succeed.',
      fetchTimeMs: 850,
      attempts,
    });
    expect(mockAcquisitionService.acquire).toHaveBeenCalledTimes(1);
  });

  it('should recommend more strategies when none could run', async () => {
    mockAcquisitionService.acquire.mockResolvedValue({
      success: false,
      url: 'https://example.com/shop',
      error: 'No acquisition strategy available',
      errorCode: 'ACQUISITION_EXHAUSTED',
      errorKind: 'exhaustion',
      elapsedMs: 1,
      attempts: [
        { strategy: 'trusted-proxy', outcome: 'unavailable', httpStatus: null, elapsedMs: 0, error: null, errorCode: null },
      ],
    });

    const result = await service.analyze({ url: 'https://example.com/shop' });

    expect(result).toHaveProperty(
      'recommendation',
      'Configure additional strategies (trusted proxy, managed rendering, FlareSolverr, proxy).',
    );
  });

  it('should throw BadRequestException for an invalid URL', async () => {
    mockAcquisitionService.acquire.mockResolvedValue({
      success: false,
      url: 'ftp://example.com',
      error: 'Invalid URL: ftp://example.com',
      errorCode: 'INVALID_URL',
      errorKind: 'invalid_request',
      elapsedMs: 0,
      attempts: [],
    });

    await expect(service.analyze({ url: 'ftp://example.com' })).rejects.toThrow(BadRequestException);
  });
});
