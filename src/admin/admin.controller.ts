import { Controller, Get, UseGuards } from '@nestjs/common'
import { ApiKeyAuthGuard } from '../auth/api-key-auth.guard'
import { RequireTier } from '../subscription/require-tier.decorator'
import { TierGuard } from '../subscription/tier.guard'
import { AdminService } from './admin.service'

@UseGuards(ApiKeyAuthGuard, TierGuard)
@RequireTier('enterprise')
@Controller('admin')
export class AdminController {
  constructor(private readonly adminService: AdminService) {}

  @Get('stats')
  getStats() {
    return this.adminService.getStats()
  }
}
