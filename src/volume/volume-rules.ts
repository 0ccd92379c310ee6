import { volumeLandmarks, type VolumeLandmarkTable } from './volume-landmarks'
import { InvalidSetCountError, UnknownMuscleGroupError, UnknownTrainingLevelError } from './volume.errors'
import {
  isMuscleGroup,
  isTrainingLevel,
  type VolumeLandmarks,
  type VolumeRecommendation,
  type VolumeRequest,
} from './volume.types'

const settle = (recommendation: VolumeRecommendation): VolumeRecommendation => Object.freeze(recommendation)

export function assertSetCount(currentSets: number): void {
  if (!Number.isInteger(currentSets) || currentSets < 0) {
    throw new InvalidSetCountError(currentSets)
  }
}

/**
 * Applies the decision rules to a request whose landmarks are already resolved.
 * First matching rule wins:
 *   1. not recovered                 -> reduce to MEV
 *   2. recovered, progressing        -> cap at MRV, otherwise no change
 *   3. recovered, not progressing    -> raise to MAV, then MRV, then hold at MRV
 */
export function recommendVolume(request: VolumeRequest, landmarks: VolumeLandmarks): VolumeRecommendation {
  const { currentSets, progress, recovered } = request
  const { mev, mav, mrv } = landmarks
  assertSetCount(currentSets)

  if (!recovered) {
    return settle({
      outcome: 'REDUCE_VOLUME',
      targetSets: mev,
      message: `Recover before adding volume - reduce to ${mev} sets per week (MEV)`,
    })
  }

  if (progress) {
    if (currentSets > mrv) {
      return settle({
        outcome: 'REDUCE_VOLUME',
        targetSets: mrv,
        message: `Progressing above recoverable volume - reduce to ${mrv} sets per week (MRV)`,
      })
    }
    return settle({
      outcome: 'NO_CHANGE',
      message: `No change needed - continue ${currentSets} sets per week (within ${mrv} sets, MRV)`,
    })
  }

  if (currentSets < mav) {
    return settle({
      outcome: 'INCREASE_VOLUME',
      targetSets: mav,
      message: `Increase to at least ${mav} sets per week (MAV)`,
    })
  }

  if (currentSets < mrv) {
    return settle({
      outcome: 'INCREASE_VOLUME',
      targetSets: mrv,
      message: `Increase toward ${mrv} sets per week (MRV)`,
    })
  }

  return settle({
    outcome: 'MAINTAIN_AT_CEILING',
    targetSets: mrv,
    message: `Hold at ${mrv} sets per week (MRV) - vary exercise selection or take a deload instead of adding volume`,
  })
}

export function toVolumeRequest(
  muscleGroup: string,
  trainingLevel: string,
  currentSets: number,
  progress: boolean,
  recovered: boolean,
): VolumeRequest {
  if (!isMuscleGroup(muscleGroup)) throw new UnknownMuscleGroupError(muscleGroup)
  if (!isTrainingLevel(trainingLevel)) throw new UnknownTrainingLevelError(trainingLevel)
  assertSetCount(currentSets)
  return { muscleGroup, trainingLevel, currentSets, progress, recovered }
}

/**
 * Validates the five inputs, resolves the landmarks and applies {@link recommendVolume}.
 */
export function recommend(
  muscleGroup: string,
  trainingLevel: string,
  currentSets: number,
  progress: boolean,
  recovered: boolean,
  table: VolumeLandmarkTable = volumeLandmarks,
): VolumeRecommendation {
  const request = toVolumeRequest(muscleGroup, trainingLevel, currentSets, progress, recovered)
  return recommendVolume(request, table.lookup(request.muscleGroup, request.trainingLevel))
}
