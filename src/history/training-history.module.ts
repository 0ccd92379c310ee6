import { Module } from '@nestjs/common'
import { AuthModule } from '../auth/auth.module'
import { SubscriptionModule } from '../subscription/subscription.module'
import { TrainingHistoryController } from './training-history.controller'
import { TrainingHistoryService } from './training-history.service'

@Module({
  imports: [AuthModule, SubscriptionModule],
  controllers: [TrainingHistoryController],
  providers: [TrainingHistoryService],
})
export class TrainingHistoryModule {}
