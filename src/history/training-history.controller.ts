import { BadRequestException, Controller, Get, Query, Req, UseGuards } from '@nestjs/common'
import { ApiKeyAuthGuard } from '../auth/api-key-auth.guard'
import { requireAuthUser, type AuthedRequest } from '../auth/auth.types'
import { DailyRateLimitGuard } from '../rate-limit/daily-rate-limit.guard'
import { RequireTier } from '../subscription/require-tier.decorator'
import { TierGuard } from '../subscription/tier.guard'
import { UnknownMuscleGroupError } from '../volume/volume.errors'
import { isMuscleGroup } from '../volume/volume.types'
import { TrainingHistoryService } from './training-history.service'

const DEFAULT_LIMIT = 50
const MAX_LIMIT = 500

@UseGuards(ApiKeyAuthGuard, TierGuard, DailyRateLimitGuard)
@RequireTier('pro')
@Controller('v1')
export class TrainingHistoryController {
  constructor(private readonly trainingHistoryService: TrainingHistoryService) {}

  @Get('history')
  getHistory(
    @Req() req: AuthedRequest,
    @Query('muscleGroup') muscleGroup?: string,
    @Query('limit') limit?: string,
  ) {
    const { userId } = requireAuthUser(req)

    if (muscleGroup !== undefined && !isMuscleGroup(muscleGroup)) {
      throw new UnknownMuscleGroupError(muscleGroup)
    }

    const parsedLimit = limit !== undefined ? Number(limit) : DEFAULT_LIMIT
    if (!Number.isInteger(parsedLimit) || parsedLimit <= 0 || parsedLimit > MAX_LIMIT) {
      throw new BadRequestException(`limit must be an integer between 1 and ${MAX_LIMIT}`)
    }

    return this.trainingHistoryService.list(userId, { muscleGroup, limit: parsedLimit })
  }

  @Get('analytics')
  getAnalytics(@Req() req: AuthedRequest) {
    return this.trainingHistoryService.analytics(requireAuthUser(req).userId)
  }
}
