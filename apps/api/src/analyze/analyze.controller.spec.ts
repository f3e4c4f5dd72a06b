import { Test, TestingModule } from '@nestjs/testing';
import { AnalyzeController } from './analyze.controller';
import { AnalyzeService } from './analyze.service';

describe('AnalyzeController', () => {
  let controller: AnalyzeController;

  const mockAnalyzeService = {
    analyze: jest.fn(),
  };

  const expectedResult = {
    success: false,
    url: 'https://example.com/',
    error: 'No acquisition strategy available',
    errorCode: 'ACQUISITION_EXHAUSTED',
    fetchTimeMs: 3,
    attempts: [],
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AnalyzeController],
      providers: [
        {
          provide: AnalyzeService,
          useValue: mockAnalyzeService,
        },
      ],
    }).compile();

    controller = module.get<AnalyzeController>(AnalyzeController);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should analyze from query parameters', async () => {
    mockAnalyzeService.analyze.mockResolvedValue(expectedResult);
    const query = { url: 'https://example.com/', detectCloaking: true };

    const result = await controller.analyzeGet(query);

    expect(mockAnalyzeService.analyze).toHaveBeenCalledWith(query);
    expect(result).toEqual(expectedResult);
  });

  it('should analyze from a JSON body', async () => {
    mockAnalyzeService.analyze.mockResolvedValue(expectedResult);
    const body = { url: 'https://example.com/', includeHtml: true };

    const result = await controller.analyzePost(body);

    expect(mockAnalyzeService.analyze).toHaveBeenCalledWith(body);
    expect(result).toEqual(expectedResult);
  });
});
