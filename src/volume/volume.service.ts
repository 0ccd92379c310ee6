import { ForbiddenException, Injectable, InternalServerErrorException } from '@nestjs/common'
import type { AuthUser } from '../auth/auth.types'
import { TrainingHistoryRepository } from '../history/training-history.repository'
import { availableMuscleGroups, hasTier } from '../subscription/subscription.types'
import { VolumeLandmarkTable } from './volume-landmarks'
import { recommendVolume, toVolumeRequest } from './volume-rules'
import { volumePredictionResponseSchema } from './volume.schema'
import type { VolumePredictionResponse } from './volume.types'

export type PredictVolumeInput = {
  currentSets: number
  trainingLevel: string
  progress: boolean
  recovered: boolean
  muscleGroup?: string
}

@Injectable()
export class VolumeService {
  constructor(
    private readonly landmarks: VolumeLandmarkTable,
    private readonly history: TrainingHistoryRepository,
  ) {}

  async predict(user: AuthUser, input: PredictVolumeInput): Promise<VolumePredictionResponse> {
    const request = toVolumeRequest(
      input.muscleGroup ?? 'chest',
      input.trainingLevel,
      input.currentSets,
      input.progress,
      input.recovered,
    )

    const allowed = availableMuscleGroups(user.tier)
    if (!allowed.includes(request.muscleGroup)) {
      throw new ForbiddenException(
        `Muscle group '${request.muscleGroup}' requires Pro or Enterprise tier. ` +
          `Available for your tier: ${allowed.join(', ')}. Upgrade at /subscription/upgrade`,
      )
    }

    const landmarks = this.landmarks.lookup(request.muscleGroup, request.trainingLevel)
    const recommendation = recommendVolume(request, landmarks)
    const targetSets = 'targetSets' in recommendation ? recommendation.targetSets : null

    if (hasTier(user.tier, 'pro')) {
      await this.history.add({
        userId: user.userId,
        ...request,
        outcome: recommendation.outcome,
        targetSets,
        message: recommendation.message,
      })
    }

    const parsed = volumePredictionResponseSchema.safeParse({
      outcome: recommendation.outcome,
      targetSets,
      message: recommendation.message,
      currentSets: request.currentSets,
      muscleGroup: request.muscleGroup,
      trainingLevel: request.trainingLevel,
      landmarks: user.tier === 'free' ? null : landmarks,
    })
    if (!parsed.success) {
      throw new InternalServerErrorException(
        `VolumePrediction validation failed: ${JSON.stringify(parsed.error.format())}`,
      )
    }

    return parsed.data
  }
}
