import { Injectable } from '@nestjs/common'
import type { MuscleGroup, VolumeOutcome } from '../volume/volume.types'
import { TrainingHistoryRepository } from './training-history.repository'
import type { HistoryQuery, TrainingAnalytics, TrainingHistoryEntry } from './training-history.types'

const RECENT_HISTORY_SIZE = 10

export function summarizeHistory(entries: TrainingHistoryEntry[]): TrainingAnalytics {
  const setsByGroup = new Map<MuscleGroup, number[]>()
  const outcomeCounts: Record<VolumeOutcome, number> = {
    REDUCE_VOLUME: 0,
    NO_CHANGE: 0,
    INCREASE_VOLUME: 0,
    MAINTAIN_AT_CEILING: 0,
  }
  let progressed = 0

  for (const entry of entries) {
    const sets = setsByGroup.get(entry.muscleGroup) ?? []
    sets.push(entry.currentSets)
    setsByGroup.set(entry.muscleGroup, sets)

    outcomeCounts[entry.outcome]++
    if (entry.progress) progressed++
  }

  const averageWeeklyVolume: TrainingAnalytics['averageWeeklyVolume'] = {}
  for (const [muscleGroup, sets] of setsByGroup) {
    const avg = sets.reduce((sum, n) => sum + n, 0) / sets.length
    averageWeeklyVolume[muscleGroup] = Number(avg.toFixed(2))
  }

  return {
    totalRecommendations: entries.length,
    muscleGroupsTracked: [...setsByGroup.keys()],
    averageWeeklyVolume,
    progressTrend: { progressed, stalled: entries.length - progressed },
    outcomeCounts,
    recentHistory: entries.slice(0, RECENT_HISTORY_SIZE),
  }
}

@Injectable()
export class TrainingHistoryService {
  constructor(private readonly history: TrainingHistoryRepository) {}

  list(userId: number, query: HistoryQuery): Promise<TrainingHistoryEntry[]> {
    return this.history.listForUser(userId, query)
  }

  async analytics(userId: number): Promise<TrainingAnalytics> {
    // newest first, so recentHistory is the head of the list
    return summarizeHistory(await this.history.listForUser(userId))
  }
}
