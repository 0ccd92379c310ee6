import landmarkData from './volume-landmarks.json'
import { InvalidLandmarkTableError, UnknownMuscleGroupError, UnknownTrainingLevelError } from './volume.errors'
import { landmarkTableDataSchema } from './volume.schema'
import {
  MUSCLE_GROUPS,
  TRAINING_LEVELS,
  isMuscleGroup,
  isTrainingLevel,
  type MuscleGroup,
  type TrainingLevel,
  type VolumeLandmarks,
} from './volume.types'

export type LandmarkTableSnapshot = Record<MuscleGroup, Record<TrainingLevel, VolumeLandmarks>>

const tableKey = (muscleGroup: MuscleGroup, trainingLevel: TrainingLevel) => `${muscleGroup}:${trainingLevel}`

/**
 * Immutable (muscle group, training level) -> landmarks lookup.
 *
 * All validation happens in {@link VolumeLandmarkTable.fromData}; a constructed table is
 * known to hold all 30 pairs with `mev <= mav <= mrv`, so `lookup` only checks its keys.
 */
export class VolumeLandmarkTable {
  private constructor(private readonly table: ReadonlyMap<string, VolumeLandmarks>) {}

  static fromData(data: unknown): VolumeLandmarkTable {
    const parsed = landmarkTableDataSchema.safeParse(data)
    if (!parsed.success) {
      throw new InvalidLandmarkTableError(
        parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      )
    }

    const issues: string[] = []
    for (const muscleGroup of Object.keys(parsed.data)) {
      if (!isMuscleGroup(muscleGroup)) issues.push(`${muscleGroup}: unknown muscle group`)
    }

    const table = new Map<string, VolumeLandmarks>()
    for (const muscleGroup of MUSCLE_GROUPS) {
      const rows = parsed.data[muscleGroup]
      if (!rows) {
        issues.push(`${muscleGroup}: missing`)
        continue
      }
      for (const level of Object.keys(rows)) {
        if (!isTrainingLevel(level)) issues.push(`${muscleGroup}.${level}: unknown training level`)
      }
      for (const trainingLevel of TRAINING_LEVELS) {
        const row = rows[trainingLevel]
        if (!row) {
          issues.push(`${muscleGroup}.${trainingLevel}: missing`)
          continue
        }
        table.set(tableKey(muscleGroup, trainingLevel), Object.freeze({ mev: row.mev, mav: row.mav, mrv: row.mrv }))
      }
    }

    if (issues.length > 0) {
      throw new InvalidLandmarkTableError(issues)
    }
    return new VolumeLandmarkTable(table)
  }

  lookup(muscleGroup: string, trainingLevel: string): VolumeLandmarks {
    if (!isMuscleGroup(muscleGroup)) throw new UnknownMuscleGroupError(muscleGroup)
    if (!isTrainingLevel(trainingLevel)) throw new UnknownTrainingLevelError(trainingLevel)

    const landmarks = this.table.get(tableKey(muscleGroup, trainingLevel))
    if (!landmarks) {
      // unreachable for a table built by fromData()
      throw new UnknownMuscleGroupError(muscleGroup)
    }
    return landmarks
  }

  muscleGroups(): readonly MuscleGroup[] {
    return MUSCLE_GROUPS
  }

  snapshot(): LandmarkTableSnapshot {
    const levels = (muscleGroup: MuscleGroup): Record<TrainingLevel, VolumeLandmarks> => ({
      beginner: this.lookup(muscleGroup, 'beginner'),
      intermediate: this.lookup(muscleGroup, 'intermediate'),
      advanced: this.lookup(muscleGroup, 'advanced'),
    })
    return {
      chest: levels('chest'),
      back: levels('back'),
      shoulders: levels('shoulders'),
      biceps: levels('biceps'),
      triceps: levels('triceps'),
      quads: levels('quads'),
      hamstrings: levels('hamstrings'),
      glutes: levels('glutes'),
      calves: levels('calves'),
      abs: levels('abs'),
    }
  }
}

export const volumeLandmarks = VolumeLandmarkTable.fromData(landmarkData)
