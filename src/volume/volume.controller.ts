import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Header,
  HttpCode,
  Param,
  ParseIntPipe,
  Post,
  Req,
  UseGuards,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common'
import { ApiKeyAuthGuard } from '../auth/api-key-auth.guard'
import { requireAuthUser, type AuthedRequest } from '../auth/auth.types'
import { DailyRateLimitGuard } from '../rate-limit/daily-rate-limit.guard'
import { PredictVolumeDto } from './dto/predict-volume.dto'
import { VolumeService } from './volume.service'

function parseYesNo(value: string, field: string): boolean {
  if (value === 'yes') return true
  if (value === 'no') return false
  throw new BadRequestException(`${field} must be 'yes' or 'no'`)
}

@UseGuards(ApiKeyAuthGuard, DailyRateLimitGuard)
@Controller()
export class VolumeController {
  constructor(private readonly volumeService: VolumeService) {}

  @Post('v1/predict-volume')
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  predict(@Body() dto: PredictVolumeDto, @Req() req: Pick<AuthedRequest, 'authUser'>) {
    return this.volumeService.predict(requireAuthUser(req), dto)
  }

  /** @deprecated use POST /v1/predict-volume */
  @Get('predict-volume/:currentSets/:trainingLevel/:progress/:recovered')
  @Header('Deprecation', 'true')
  async predictLegacy(
    @Param('currentSets', ParseIntPipe) currentSets: number,
    @Param('trainingLevel') trainingLevel: string,
    @Param('progress') progress: string,
    @Param('recovered') recovered: string,
    @Req() req: Pick<AuthedRequest, 'authUser'>,
  ) {
    const result = await this.volumeService.predict(requireAuthUser(req), {
      currentSets,
      trainingLevel,
      progress: parseYesNo(progress, 'progress'),
      recovered: parseYesNo(recovered, 'recovered'),
      muscleGroup: 'chest',
    })
    return { volumePrediction: result.message }
  }
}
