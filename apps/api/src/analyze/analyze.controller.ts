import { Body, Controller, Get, HttpCode, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AnalyzeService } from './analyze.service';
import { AnalyzeRequestDto } from './dto/analyze-request.dto';
import type { AnalyzeResponse } from './analyze.types';

@ApiTags('Analyze')
@Controller('analyze')
export class AnalyzeController {
  constructor(private readonly analyzeService: AnalyzeService) {}

  @Get()
  @ApiOperation({
    summary: 'Analyze a URL',
    description: 'Fetch the page as a search crawler, extract SEO metadata and optionally detect cloaking.',
  })
  @ApiResponse({ status: 200, description: 'Analysis result; acquisition failures are reported in the body' })
  @ApiResponse({ status: 400, description: 'Invalid URL' })
  analyzeGet(@Query() query: AnalyzeRequestDto): Promise<AnalyzeResponse> {
    return this.analyzeService.analyze(query);
  }

  @Post()
  @HttpCode(200)
  @ApiOperation({ summary: 'Analyze a URL (JSON body)' })
  @ApiResponse({ status: 200, description: 'Analysis result; acquisition failures are reported in the body' })
  @ApiResponse({ status: 400, description: 'Invalid URL' })
  analyzePost(@Body() body: AnalyzeRequestDto): Promise<AnalyzeResponse> {
    return this.analyzeService.analyze(body);
  }
}
