export const MUSCLE_GROUPS = [
  'chest',
  'back',
  'shoulders',
  'biceps',
  'triceps',
  'quads',
  'hamstrings',
  'glutes',
  'calves',
  'abs',
] as const

export const TRAINING_LEVELS = ['beginner', 'intermediate', 'advanced'] as const

export const VOLUME_OUTCOMES = [
  'REDUCE_VOLUME',
  'NO_CHANGE',
  'INCREASE_VOLUME',
  'MAINTAIN_AT_CEILING',
] as const

export type MuscleGroup = (typeof MUSCLE_GROUPS)[number]

export type TrainingLevel = (typeof TRAINING_LEVELS)[number]

export type VolumeOutcome = (typeof VOLUME_OUTCOMES)[number]

/** Weekly set counts for one (muscle group, training level) pair. */
export type VolumeLandmarks = {
  readonly mev: number // minimum effective volume
  readonly mav: number // maximum adaptive volume
  readonly mrv: number // maximum recoverable volume
}

export type VolumeRequest = {
  currentSets: number
  progress: boolean
  recovered: boolean
  trainingLevel: TrainingLevel
  muscleGroup: MuscleGroup
}

export type VolumeRecommendation =
  | { readonly outcome: 'NO_CHANGE'; readonly message: string }
  | {
      readonly outcome: Exclude<VolumeOutcome, 'NO_CHANGE'>
      readonly targetSets: number
      readonly message: string
    }

export function isMuscleGroup(value: unknown): value is MuscleGroup {
  return typeof value === 'string' && (MUSCLE_GROUPS as readonly string[]).includes(value)
}

export function isTrainingLevel(value: unknown): value is TrainingLevel {
  return typeof value === 'string' && (TRAINING_LEVELS as readonly string[]).includes(value)
}

export type VolumePredictionResponse = {
  outcome: VolumeOutcome
  targetSets: number | null
  message: string
  currentSets: number
  muscleGroup: MuscleGroup
  trainingLevel: TrainingLevel
  /** Only returned to paid tiers. */
  landmarks: VolumeLandmarks | null
}
