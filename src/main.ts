import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import dotenv from 'dotenv'
import { AppModule } from './app.module'
import { APP_CONFIG, type AppConfig } from './config/app-config'
import { createHttpLogger } from './observability/http-logger'

dotenv.config()

async function bootstrap() {
  const app = await NestFactory.create(AppModule)
  const config = app.get<AppConfig>(APP_CONFIG)

  app.use(createHttpLogger(config.logLevel))
  app.enableCors({
    origin: config.corsOrigin,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'x-api-key', 'authorization', 'x-request-id'],
  })
  app.enableShutdownHooks()

  await app.listen(config.port)
  Logger.log(`${config.appName} ${config.appVersion} listening on :${config.port}`, 'Bootstrap')
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.stack ?? err.message : String(err), 'Bootstrap')
  process.exit(1)
})
