import { Module } from '@nestjs/common'
import { AdminModule } from './admin/admin.module'
import { AppController } from './app.controller'
import { AuthModule } from './auth/auth.module'
import { ConfigModule } from './config/config.module'
import { DatabaseModule } from './database/database.module'
import { TrainingHistoryModule } from './history/training-history.module'
import { RateLimitModule } from './rate-limit/rate-limit.module'
import { SubscriptionModule } from './subscription/subscription.module'
import { VolumeModule } from './volume/volume.module'

@Module({
  imports: [
    ConfigModule,
    DatabaseModule,
    RateLimitModule,
    AuthModule,
    SubscriptionModule,
    VolumeModule,
    TrainingHistoryModule,
    AdminModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
