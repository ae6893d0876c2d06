import { Module } from '@nestjs/common'
import { ConfigModule } from '@nestjs/config'
import { AnalysisModule } from '@modules/analysis/analysis.module'
import APP_CONFIG, { validateEnv } from './config/app.config'
import { FacebookAdsModule } from './facebook-ads/facebook-ads.module'

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [APP_CONFIG],
      validate: validateEnv,
    }),
    FacebookAdsModule,
    AnalysisModule,
  ],
})
export class AppModule {}
