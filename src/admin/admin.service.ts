import { Inject, Injectable } from '@nestjs/common'
import { TrainingHistoryRepository } from '../history/training-history.repository'
import { CLOCK, type Clock } from '../rate-limit/clock'
import { DailyRateLimitService } from '../rate-limit/daily-rate-limit.service'
import { UsersRepository } from '../users/users.repository'

@Injectable()
export class AdminService {
  constructor(
    private readonly users: UsersRepository,
    private readonly history: TrainingHistoryRepository,
    private readonly limiter: DailyRateLimitService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async getStats() {
    const [usersByTier, totalTrainingHistoryEntries] = await Promise.all([
      this.users.countByTier(),
      this.history.countAll(),
    ])

    return {
      totalUsers: usersByTier.free + usersByTier.pro + usersByTier.enterprise,
      usersByTier,
      requestsToday: this.limiter.totalToday(),
      totalTrainingHistoryEntries,
      timestamp: this.clock.now().toISOString(),
    }
  }
}
