import { BadRequestException, Inject, Injectable, InternalServerErrorException, Logger } from '@nestjs/common'
import type { AuthUser } from '../auth/auth.types'
import { APP_CONFIG, type AppConfig } from '../config/app-config'
import { DailyRateLimitService } from '../rate-limit/daily-rate-limit.service'
import { UsersRepository } from '../users/users.repository'
import { subscriptionInfoSchema } from './subscription.schema'
import { availableMuscleGroups, tierRank, type PaidTier, type SubscriptionInfo } from './subscription.types'

@Injectable()
export class SubscriptionService {
  private readonly logger = new Logger(SubscriptionService.name)

  constructor(
    private readonly users: UsersRepository,
    private readonly limiter: DailyRateLimitService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  getInfo(user: AuthUser): SubscriptionInfo {
    const parsed = subscriptionInfoSchema.safeParse({
      tier: user.tier,
      dailyLimit: this.config.rateLimit.dailyLimits[user.tier],
      usageToday: this.limiter.usedToday(user.userId),
      availableMuscleGroups: availableMuscleGroups(user.tier),
    })
    if (!parsed.success) {
      throw new InternalServerErrorException(
        `SubscriptionInfo validation failed: ${JSON.stringify(parsed.error.format())}`,
      )
    }
    return parsed.data
  }

  /** Applies the upgrade directly; no payment is taken. */
  async upgrade(user: AuthUser, tier: PaidTier) {
    if (tierRank(tier) <= tierRank(user.tier)) {
      throw new BadRequestException('Cannot downgrade or keep the current tier. Contact support for downgrades.')
    }

    const updated = await this.users.updateTier(user.userId, tier)
    this.logger.log(`User ${user.userId} upgraded ${user.tier} -> ${updated.subscriptionTier}`)

    return {
      message: `Successfully upgraded to ${updated.subscriptionTier} tier`,
      newTier: updated.subscriptionTier,
    }
  }
}
