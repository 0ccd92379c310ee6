export type VolumeInputErrorCode =
  | 'UNKNOWN_MUSCLE_GROUP'
  | 'UNKNOWN_TRAINING_LEVEL'
  | 'INVALID_SET_COUNT'

/**
 * Base class for every input the volume core refuses. These are validation failures,
 * never transient, so callers surface them instead of retrying.
 */
export abstract class VolumeInputError extends Error {
  abstract readonly code: VolumeInputErrorCode

  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

export class UnknownMuscleGroupError extends VolumeInputError {
  readonly code = 'UNKNOWN_MUSCLE_GROUP'

  constructor(readonly muscleGroup: string) {
    super(`Invalid muscle group: '${muscleGroup}'`)
  }
}

export class UnknownTrainingLevelError extends VolumeInputError {
  readonly code = 'UNKNOWN_TRAINING_LEVEL'

  constructor(readonly trainingLevel: string) {
    super(`Invalid training level: '${trainingLevel}'`)
  }
}

export class InvalidSetCountError extends VolumeInputError {
  readonly code = 'INVALID_SET_COUNT'

  constructor(readonly currentSets: number) {
    super(`Current sets must be a non-negative integer, got ${currentSets}`)
  }
}

/** Raised while building the landmark table at startup; not a caller input error. */
export class InvalidLandmarkTableError extends Error {
  readonly code = 'INVALID_LANDMARK_TABLE'

  constructor(readonly issues: string[]) {
    super(`Invalid volume landmark table: ${issues.join('; ')}`)
    this.name = new.target.name
  }
}
