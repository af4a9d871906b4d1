import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString, Matches, MaxLength } from 'class-validator';
import { LOGIN_PATTERN } from './add-individual.dto.js';

export class ConnectOrganizationDto {
  @ApiProperty({ example: 'acme' })
  @IsString()
  @MaxLength(39)
  @Matches(LOGIN_PATTERN, { message: 'login must be a valid GitHub organization name' })
  login!: string;

  @ApiProperty({ description: 'OAuth token with access to the organization' })
  @IsString()
  @IsNotEmpty()
  accessToken!: string;

  @ApiPropertyOptional({ example: 'repo,read:org' })
  @IsOptional()
  @IsString()
  scopes?: string;
}
