import { ApiProperty } from '@nestjs/swagger'
import { IsNotEmpty, IsString } from 'class-validator'

export class AccessTokenDto {
  @ApiProperty({ description: 'Meta user or system-user access token with ads_read and read_insights' })
  @IsString()
  @IsNotEmpty()
  accessToken!: string
}
