import { Controller, Get, Inject } from '@nestjs/common'
import { APP_CONFIG, type AppConfig } from './config/app-config'
import { CLOCK, type Clock } from './rate-limit/clock'
import { SUBSCRIPTION_TIERS } from './subscription/subscription.types'
import { VolumeLandmarkTable } from './volume/volume-landmarks'

@Controller()
export class AppController {
  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly landmarks: VolumeLandmarkTable,
  ) {}

  @Get()
  getRoot() {
    return {
      message: `Welcome to ${this.config.appName}`,
      version: this.config.appVersion,
      getStarted: '/auth/register',
      pricing: Object.fromEntries(
        SUBSCRIPTION_TIERS.map((tier) => [
          tier,
          { price: this.config.pricing[tier] / 100, dailyLimit: this.config.rateLimit.dailyLimits[tier] },
        ]),
      ),
    }
  }

  @Get('health')
  health() {
    return { status: 'healthy', timestamp: this.clock.now().toISOString() }
  }

  @Get('muscle-groups')
  listMuscleGroups() {
    return {
      muscleGroups: this.landmarks.muscleGroups(),
      landmarks: this.landmarks.snapshot(),
      note: "Free tier has access to 'chest' only. Upgrade to Pro for all muscle groups.",
    }
  }
}
