import { Controller, Get, Header, Query } from '@nestjs/common';
import { ApiOperation, ApiProduces, ApiResponse, ApiTags } from '@nestjs/swagger';
import { PreviewRequestDto } from './dto/preview-request.dto';
import { ViewRequestDto } from './dto/view-request.dto';
import { ViewService, type PreviewResponse, type ViewResponse } from './view.service';

@ApiTags('Crawler View')
@Controller('crawler-view')
export class ViewController {
  constructor(private readonly viewService: ViewService) {}

  @Get()
  @ApiOperation({
    summary: 'Fetch a page as a crawler or a visitor',
    description: 'Returns the acquired HTML together with the strategy that produced it.',
  })
  @ApiResponse({ status: 200, description: 'Page acquired' })
  @ApiResponse({ status: 400, description: 'Invalid URL' })
  @ApiResponse({ status: 502, description: 'Every strategy failed' })
  view(@Query() query: ViewRequestDto): Promise<ViewResponse> {
    return this.viewService.view(query);
  }

  @Get('preview')
  @ApiOperation({
    summary: 'Crawler and visitor views side by side',
    description: 'Each view carries its title, canonical and HTML; a failed view carries its error.',
  })
  @ApiResponse({ status: 200, description: 'Preview; acquisition failures are reported per view' })
  @ApiResponse({ status: 400, description: 'Invalid URL' })
  preview(@Query() query: PreviewRequestDto): Promise<PreviewResponse> {
    return this.viewService.preview(query);
  }

  @Get('raw')
  @Header('Content-Type', 'text/html; charset=utf-8')
  @ApiProduces('text/html')
  @ApiOperation({ summary: 'Raw HTML of a page as a crawler or a visitor sees it' })
  @ApiResponse({ status: 200, description: 'Page HTML' })
  @ApiResponse({ status: 400, description: 'Invalid URL' })
  @ApiResponse({ status: 502, description: 'Every strategy failed' })
  raw(@Query() query: ViewRequestDto): Promise<string> {
    return this.viewService.raw(query);
  }
}
