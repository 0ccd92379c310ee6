import { type CanActivate, type ExecutionContext, ForbiddenException, Injectable } from '@nestjs/common'
import { Reflector } from '@nestjs/core'
import { requireAuthUser, type AuthedRequest } from '../auth/auth.types'
import { REQUIRED_TIER_KEY } from './require-tier.decorator'
import { hasTier, type SubscriptionTier } from './subscription.types'

const TIER_LABEL: Record<SubscriptionTier, string> = {
  free: 'Free',
  pro: 'Pro or Enterprise',
  enterprise: 'Enterprise',
}

/** Enforces `@RequireTier(...)`. Must run after ApiKeyAuthGuard. */
@Injectable()
export class TierGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(ctx: ExecutionContext): boolean {
    const required = this.reflector.getAllAndOverride<SubscriptionTier | undefined>(REQUIRED_TIER_KEY, [
      ctx.getHandler(),
      ctx.getClass(),
    ])
    return this.check(ctx.switchToHttp().getRequest<AuthedRequest>(), required)
  }

  check(req: Pick<AuthedRequest, 'authUser'>, required: SubscriptionTier | undefined): boolean {
    if (!required) return true

    const user = requireAuthUser(req)
    if (!hasTier(user.tier, required)) {
      throw new ForbiddenException(`This endpoint requires ${TIER_LABEL[required]} tier. Upgrade at /subscription/upgrade`)
    }
    return true
  }
}
