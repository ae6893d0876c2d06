import { Module } from '@nestjs/common'
import { FacebookAdsController } from './facebook-ads.controller'
import { FacebookAdsService } from './facebook-ads.service'
import { FacebookGraphClientFactory } from './facebook-graph.client'

@Module({
  providers: [FacebookGraphClientFactory, FacebookAdsService],
  controllers: [FacebookAdsController],
  exports: [FacebookAdsService],
})
export class FacebookAdsModule {}
