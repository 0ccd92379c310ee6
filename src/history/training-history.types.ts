import type { MuscleGroup, TrainingLevel, VolumeOutcome } from '../volume/volume.types'

export type TrainingHistoryEntry = {
  id: number
  userId: number
  muscleGroup: MuscleGroup
  trainingLevel: TrainingLevel
  currentSets: number
  progress: boolean
  recovered: boolean
  outcome: VolumeOutcome
  targetSets: number | null
  message: string
  createdAt: Date
}

export type NewTrainingHistoryEntry = Omit<TrainingHistoryEntry, 'id' | 'createdAt'>

export type HistoryQuery = {
  muscleGroup?: MuscleGroup
  limit?: number
}

export type TrainingAnalytics = {
  totalRecommendations: number
  muscleGroupsTracked: MuscleGroup[]
  averageWeeklyVolume: Partial<Record<MuscleGroup, number>>
  progressTrend: { progressed: number; stalled: number }
  outcomeCounts: Record<VolumeOutcome, number>
  recentHistory: TrainingHistoryEntry[]
}
