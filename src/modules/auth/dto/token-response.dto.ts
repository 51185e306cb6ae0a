import { ApiProperty } from '@nestjs/swagger';

export class TokenResponseDto {
  @ApiProperty({ example: 'eyJhbGciOiJIUzI1NiIsInR5cCI6IkpXVCJ9...' })
  readonly access_token: string;

  @ApiProperty({ example: 'bearer' })
  readonly token_type: string;

  constructor(accessToken: string, tokenType: string) {
    this.access_token = accessToken;
    this.token_type = tokenType;
  }
}
