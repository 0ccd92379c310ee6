import { Module } from '@nestjs/common'
import { AuthModule } from '../auth/auth.module'
import { SubscriptionController } from './subscription.controller'
import { SubscriptionService } from './subscription.service'
import { TierGuard } from './tier.guard'

@Module({
  imports: [AuthModule],
  controllers: [SubscriptionController],
  providers: [SubscriptionService, TierGuard],
  exports: [SubscriptionService, TierGuard],
})
export class SubscriptionModule {}
