import { z } from 'zod'
import { MUSCLE_GROUPS, TRAINING_LEVELS, VOLUME_OUTCOMES } from './volume.types'

export const muscleGroupSchema = z.enum(MUSCLE_GROUPS)

export const trainingLevelSchema = z.enum(TRAINING_LEVELS)

export const volumeOutcomeSchema = z.enum(VOLUME_OUTCOMES)

export const volumeLandmarksSchema = z
  .object({
    mev: z.number().int().nonnegative(),
    mav: z.number().int().nonnegative(),
    mrv: z.number().int().nonnegative(),
  })
  .strict()
  .refine((l) => l.mev <= l.mav && l.mav <= l.mrv, {
    message: 'expected mev <= mav <= mrv',
  })

export const landmarkTableDataSchema = z.record(z.string(), z.record(z.string(), volumeLandmarksSchema))

export const volumePredictionResponseSchema = z.object({
  outcome: volumeOutcomeSchema,
  targetSets: z.number().int().nonnegative().nullable(),
  message: z.string(),
  currentSets: z.number().int().nonnegative(),
  muscleGroup: muscleGroupSchema,
  trainingLevel: trainingLevelSchema,
  landmarks: z.object({ mev: z.number(), mav: z.number(), mrv: z.number() }).nullable(),
})
