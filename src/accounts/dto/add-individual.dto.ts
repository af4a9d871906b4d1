import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, Matches, MaxLength } from 'class-validator';

// GitHub logins: alphanumerics and single inner hyphens
export const LOGIN_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9]|-(?=[A-Za-z0-9])){0,38}$/;

export class AddIndividualDto {
  @ApiProperty({ example: 'octocat' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(39)
  @Matches(LOGIN_PATTERN, { message: 'login must be a valid GitHub username' })
  login!: string;
}
