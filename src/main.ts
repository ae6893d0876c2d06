import 'reflect-metadata'
import { Logger, ValidationPipe } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger'
import * as dotenv from 'dotenv'
import { AppModule } from './app.module'
import { loadAppConfig } from './config/app.config'

dotenv.config()

const logger = new Logger('Bootstrap')

async function bootstrap() {
  const { port, logLevels } = loadAppConfig()
  const app = await NestFactory.create(AppModule, { logger: logLevels })

  app.enableCors({ origin: true, credentials: true })

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  )

  // Prefix API (no leading '/')
  app.setGlobalPrefix('api/v1')

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Campaign Insights')
    .setDescription('Campaign spreadsheet and Meta Ads ingestion, KPIs and AI insights')
    .setVersion('1.0')
    .build()

  if (process.env.NODE_ENV !== 'production') {
    const document = SwaggerModule.createDocument(app, swaggerConfig)
    // GET /api/v1/explorer
    SwaggerModule.setup('explorer', app, document, { useGlobalPrefix: true })
  }

  app.enableShutdownHooks()

  await app.listen(port)
  logger.log(`🚀 Server is running at http://localhost:${port}`)
}

bootstrap().catch((err: unknown) => {
  logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err))
  process.exit(1)
})
