import { Inject, Injectable } from '@nestjs/common'
import { CLOCK, nextUtcMidnightIso, utcDayKey, type Clock } from './clock'

export type ConsumeResult = {
  allowed: boolean
  limit: number
  used: number
  resetAtIso: string
  dayKeyUtc: string
}

/**
 * Per-user request counter that resets at UTC midnight. In-memory: counts are lost on
 * restart and not shared between processes.
 */
@Injectable()
export class DailyRateLimitService {
  /**
   * Map key: `${userId}:${YYYY-MM-DD}` (UTC)
   * Value: requests used that day
   */
  private readonly usedByUserDay = new Map<string, number>()

  private opsSinceCleanup = 0

  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  consume(userId: number, limit: number): ConsumeResult {
    const now = this.clock.now()
    const dayKeyUtc = utcDayKey(now)
    const resetAtIso = nextUtcMidnightIso(now)

    const safeLimit = Number.isFinite(limit) && limit > 0 ? Math.floor(limit) : 0
    const key = `${userId}:${dayKeyUtc}`
    const used = this.usedByUserDay.get(key) ?? 0

    this.opsSinceCleanup++
    if (this.opsSinceCleanup % 200 === 0) {
      this.cleanupBefore(dayKeyUtc)
    }

    if (used + 1 > safeLimit) {
      return { allowed: false, limit: safeLimit, used, resetAtIso, dayKeyUtc }
    }

    const nextUsed = used + 1
    this.usedByUserDay.set(key, nextUsed)
    return { allowed: true, limit: safeLimit, used: nextUsed, resetAtIso, dayKeyUtc }
  }

  /** Requests the user has made today, without consuming one. */
  usedToday(userId: number): number {
    return this.usedByUserDay.get(`${userId}:${utcDayKey(this.clock.now())}`) ?? 0
  }

  /** Requests made today across all users. */
  totalToday(): number {
    const suffix = `:${utcDayKey(this.clock.now())}`
    let total = 0
    for (const [key, used] of this.usedByUserDay) {
      if (key.endsWith(suffix)) total += used
    }
    return total
  }

  private cleanupBefore(dayKeyUtc: string) {
    for (const key of this.usedByUserDay.keys()) {
      const dayKey = key.split(':')[1]
      // ISO day keys sort lexicographically
      if (dayKey !== undefined && dayKey < dayKeyUtc) {
        this.usedByUserDay.delete(key)
      }
    }
  }
}
