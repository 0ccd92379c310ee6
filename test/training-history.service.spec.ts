import { summarizeHistory, TrainingHistoryService } from '../src/history/training-history.service'
import type { TrainingHistoryEntry } from '../src/history/training-history.types'
import { FixedClock, InMemoryTrainingHistoryRepository } from './support/in-memory-repositories'
import { historyEntry, TEST_NOW } from './support/fixtures'

describe('summarizeHistory', () => {
  const entry = (id: number, overrides: Partial<TrainingHistoryEntry> = {}): TrainingHistoryEntry => ({
    ...historyEntry(),
    id,
    createdAt: new Date(TEST_NOW.getTime() - id * 60_000),
    ...overrides,
  })

  it('returns zeroed analytics for an empty history', () => {
    expect(summarizeHistory([])).toEqual({
      totalRecommendations: 0,
      muscleGroupsTracked: [],
      averageWeeklyVolume: {},
      progressTrend: { progressed: 0, stalled: 0 },
      outcomeCounts: { REDUCE_VOLUME: 0, NO_CHANGE: 0, INCREASE_VOLUME: 0, MAINTAIN_AT_CEILING: 0 },
      recentHistory: [],
    })
  })

  it('averages sets per muscle group and counts outcomes', () => {
    const entries = [
      entry(1, { currentSets: 12 }),
      entry(2, { currentSets: 13, progress: true, outcome: 'NO_CHANGE', targetSets: null }),
      entry(3, { currentSets: 15 }),
      entry(4, { muscleGroup: 'back', currentSets: 20, recovered: false, outcome: 'REDUCE_VOLUME', targetSets: 12 }),
    ]

    const analytics = summarizeHistory(entries)

    expect(analytics.totalRecommendations).toBe(4)
    expect(analytics.muscleGroupsTracked).toEqual(['chest', 'back'])
    expect(analytics.averageWeeklyVolume).toEqual({ chest: 13.33, back: 20 })
    expect(analytics.progressTrend).toEqual({ progressed: 1, stalled: 3 })
    expect(analytics.outcomeCounts).toEqual({
      REDUCE_VOLUME: 1,
      NO_CHANGE: 1,
      INCREASE_VOLUME: 2,
      MAINTAIN_AT_CEILING: 0,
    })
  })

  it('keeps the first ten entries as recent history', () => {
    const entries = Array.from({ length: 12 }, (_, i) => entry(i + 1))

    expect(summarizeHistory(entries).recentHistory.map((e) => e.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10])
  })
})

describe('TrainingHistoryService', () => {
  let clock: FixedClock
  let repo: InMemoryTrainingHistoryRepository
  let service: TrainingHistoryService

  beforeEach(async () => {
    clock = new FixedClock(new Date('2026-03-08T08:00:00.000Z'))
    repo = new InMemoryTrainingHistoryRepository(clock)
    service = new TrainingHistoryService(repo)

    await repo.add(historyEntry({ currentSets: 10 }))
    clock.current = new Date('2026-03-09T08:00:00.000Z')
    await repo.add(historyEntry({ muscleGroup: 'back', currentSets: 16 }))
    clock.current = new Date('2026-03-10T08:00:00.000Z')
    await repo.add(historyEntry({ currentSets: 14 }))
    await repo.add(historyEntry({ userId: 99, currentSets: 30 }))
  })

  it('lists the user history newest first', async () => {
    const rows = await service.list(2, {})

    expect(rows.map((r) => r.currentSets)).toEqual([14, 16, 10])
  })

  it('filters by muscle group and limit', async () => {
    await expect(service.list(2, { muscleGroup: 'chest' })).resolves.toHaveLength(2)
    const limited = await service.list(2, { limit: 1 })
    expect(limited.map((r) => r.id)).toEqual([3])
  })

  it('summarizes only the caller entries', async () => {
    const analytics = await service.analytics(2)

    expect(analytics.totalRecommendations).toBe(3)
    expect(analytics.muscleGroupsTracked).toEqual(['chest', 'back'])
    expect(analytics.averageWeeklyVolume).toEqual({ chest: 12, back: 16 })
    expect(analytics.recentHistory[0]?.id).toBe(3)
  })
})
