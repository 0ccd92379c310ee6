import { AdminService } from '../src/admin/admin.service'
import { DailyRateLimitService } from '../src/rate-limit/daily-rate-limit.service'
import { FixedClock, InMemoryTrainingHistoryRepository, InMemoryUsersRepository } from './support/in-memory-repositories'
import { historyEntry, TEST_NOW } from './support/fixtures'

describe('AdminService', () => {
  it('aggregates users, history and today requests', async () => {
    const clock = new FixedClock(TEST_NOW)
    const users = new InMemoryUsersRepository(clock)
    const history = new InMemoryTrainingHistoryRepository(clock)
    const limiter = new DailyRateLimitService(clock)
    const service = new AdminService(users, history, limiter, clock)

    await users.seed('a@example.test')
    await users.seed('b@example.test')
    await users.seed('c@example.test')
    await users.updateTier(2, 'pro')
    await users.updateTier(3, 'enterprise')
    await history.add(historyEntry())
    await history.add(historyEntry({ userId: 3 }))
    limiter.consume(1, 10)
    limiter.consume(2, 10)
    limiter.consume(2, 10)

    await expect(service.getStats()).resolves.toEqual({
      totalUsers: 3,
      usersByTier: { free: 1, pro: 1, enterprise: 1 },
      requestsToday: 3,
      totalTrainingHistoryEntries: 2,
      timestamp: '2026-03-10T09:30:00.000Z',
    })
  })
})
