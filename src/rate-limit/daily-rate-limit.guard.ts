import {
  type CanActivate,
  type ExecutionContext,
  HttpException,
  HttpStatus,
  Inject,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common'
import { APP_CONFIG, type AppConfig } from '../config/app-config'
import type { AuthedRequest } from '../auth/auth.types'
import { DailyRateLimitService } from './daily-rate-limit.service'

/**
 * Consumes one request from the caller's daily quota. Must run after
 * ApiKeyAuthGuard, which attaches `authUser`.
 */
@Injectable()
export class DailyRateLimitGuard implements CanActivate {
  private readonly logger = new Logger(DailyRateLimitGuard.name)

  constructor(
    private readonly limiter: DailyRateLimitService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  canActivate(ctx: ExecutionContext): boolean {
    return this.check(ctx.switchToHttp().getRequest<AuthedRequest>())
  }

  check(req: Pick<AuthedRequest, 'authUser'>): boolean {
    const user = req.authUser
    if (!user) {
      throw new UnauthorizedException('API key required')
    }
    if (!this.config.rateLimit.enabled) {
      return true
    }

    const limit = this.config.rateLimit.dailyLimits[user.tier]
    const result = this.limiter.consume(user.userId, limit)

    if (!result.allowed) {
      this.logger.warn(`Daily limit reached for user ${user.userId} (${user.tier}, ${result.limit}/day)`)
      throw new HttpException(
        {
          statusCode: HttpStatus.TOO_MANY_REQUESTS,
          message: `Rate limit exceeded. Your ${user.tier} tier allows ${result.limit} requests per day. Upgrade at /subscription/upgrade`,
          limit: result.limit,
          used: result.used,
          resetAtIso: result.resetAtIso,
        },
        HttpStatus.TOO_MANY_REQUESTS,
      )
    }

    return true
  }
}
