import { IsBoolean, IsOptional, IsUrl } from 'class-validator';
import { Transform } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

// Query strings carry booleans as text; "false" must not become true
export const toBoolean = () =>
  Transform(({ obj, key }) => {
    const raw: unknown = obj[key];
    return raw === true || raw === 'true' || raw === '1';
  });

export class AcquisitionFlagsDto {
  @ApiPropertyOptional({
    description: 'Skip the crawler-view API and start with the next strategy',
    default: false,
  })
  @IsOptional()
  @toBoolean()
  @IsBoolean()
  skipTrustedProxy?: boolean;

  @ApiPropertyOptional({
    description: 'Try channels that origins trust as genuine crawler traffic first',
    default: false,
  })
  @IsOptional()
  @toBoolean()
  @IsBoolean()
  preferCloakedProvenance?: boolean;

  @ApiPropertyOptional({
    description: 'Ignore cached documents (fresh results are still cached)',
    default: false,
  })
  @IsOptional()
  @toBoolean()
  @IsBoolean()
  bypassCache?: boolean;
}

export class AnalyzeRequestDto extends AcquisitionFlagsDto {
  @ApiProperty({
    description: 'Page to analyze',
    example: 'https://example.com/product/123',
  })
  @IsUrl({ protocols: ['http', 'https'], require_protocol: true, require_tld: false, disallow_auth: true }, { message: 'url must be a valid http(s) URL' })
  url!: string;

  @ApiPropertyOptional({
    description: 'Also fetch the page as a regular visitor and compare both versions',
    default: false,
  })
  @IsOptional()
  @toBoolean()
  @IsBoolean()
  detectCloaking?: boolean;

  @ApiPropertyOptional({
    description: 'Include the crawler HTML in the response',
    default: false,
  })
  @IsOptional()
  @toBoolean()
  @IsBoolean()
  includeHtml?: boolean;
}
