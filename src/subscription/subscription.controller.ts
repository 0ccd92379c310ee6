import { Body, Controller, Get, HttpCode, Post, Req, UseGuards, UsePipes, ValidationPipe } from '@nestjs/common'
import { ApiKeyAuthGuard } from '../auth/api-key-auth.guard'
import { requireAuthUser, type AuthedRequest } from '../auth/auth.types'
import { UpgradeSubscriptionDto } from './dto/upgrade-subscription.dto'
import { SubscriptionService } from './subscription.service'

@UseGuards(ApiKeyAuthGuard)
@Controller('subscription')
export class SubscriptionController {
  constructor(private readonly subscriptionService: SubscriptionService) {}

  @Get('info')
  getInfo(@Req() req: AuthedRequest) {
    return this.subscriptionService.getInfo(requireAuthUser(req))
  }

  @Post('upgrade')
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  upgrade(@Body() dto: UpgradeSubscriptionDto, @Req() req: AuthedRequest) {
    return this.subscriptionService.upgrade(requireAuthUser(req), dto.tier)
  }
}
