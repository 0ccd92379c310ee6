import { Global, Module } from '@nestjs/common'
import { DailyRateLimitGuard } from './daily-rate-limit.guard'
import { DailyRateLimitService } from './daily-rate-limit.service'
import { CLOCK, SystemClock } from './clock'

@Global()
@Module({
  providers: [{ provide: CLOCK, useClass: SystemClock }, DailyRateLimitService, DailyRateLimitGuard],
  exports: [DailyRateLimitService, DailyRateLimitGuard, CLOCK],
})
export class RateLimitModule {}
