import { Body, Controller, HttpCode, Post } from '@nestjs/common'
import { ApiOperation, ApiTags } from '@nestjs/swagger'
import { AccessTokenDto } from './dto/facebook-ads.dto'
import { FacebookAdsService } from './facebook-ads.service'

@ApiTags('ads-api')
@Controller('ads-api')
export class FacebookAdsController {
  constructor(private readonly fbService: FacebookAdsService) {}

  @Post('validate-token')
  @HttpCode(200)
  @ApiOperation({ summary: 'Check a token and its ads_read / read_insights permissions' })
  validateToken(@Body() dto: AccessTokenDto) {
    return this.fbService.validateToken(dto.accessToken)
  }

  @Post('accounts')
  @HttpCode(200)
  @ApiOperation({ summary: 'List the ad accounts the token can read' })
  listAccounts(@Body() dto: AccessTokenDto) {
    return this.fbService.listAdAccounts(dto.accessToken)
  }
}
