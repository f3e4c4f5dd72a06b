import { IsIn, IsOptional, IsUrl } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IDENTITIES, type Identity } from '@cloakscope/shared';
import { AcquisitionFlagsDto } from '../../analyze/dto/analyze-request.dto';

export class ViewRequestDto extends AcquisitionFlagsDto {
  @ApiProperty({ example: 'https://example.com/' })
  @IsUrl({ protocols: ['http', 'https'], require_protocol: true, require_tld: false, disallow_auth: true }, { message: 'url must be a valid http(s) URL' })
  url!: string;

  @ApiPropertyOptional({ enum: IDENTITIES, default: 'crawler' })
  @IsOptional()
  @IsIn(IDENTITIES)
  mode?: Identity;
}
