import { IsBoolean, IsOptional, IsUrl } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { AcquisitionFlagsDto, toBoolean } from '../../analyze/dto/analyze-request.dto';

export class PreviewRequestDto extends AcquisitionFlagsDto {
  @ApiProperty({ example: 'https://example.com/' })
  @IsUrl({ protocols: ['http', 'https'], require_protocol: true, require_tld: false, disallow_auth: true }, { message: 'url must be a valid http(s) URL' })
  url!: string;

  @ApiPropertyOptional({
    description: 'Also fetch the page as a regular visitor',
    default: true,
  })
  @IsOptional()
  @toBoolean()
  @IsBoolean()
  includeVisitor?: boolean;
}
