import { type CanActivate, type ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common'
import { UsersRepository } from '../users/users.repository'
import type { User } from '../users/users.types'
import { AuthService } from './auth.service'
import type { AuthCandidate, AuthedRequest } from './auth.types'

/**
 * Accepts `X-API-Key: <key>` or `Authorization: Bearer <jwt>` and attaches
 * `authUser` to the request. The API key wins when both are sent.
 */
@Injectable()
export class ApiKeyAuthGuard implements CanActivate {
  constructor(
    private readonly users: UsersRepository,
    private readonly auth: AuthService,
  ) {}

  canActivate(ctx: ExecutionContext): Promise<boolean> {
    return this.authenticate(ctx.switchToHttp().getRequest<AuthedRequest>())
  }

  async authenticate(req: AuthCandidate): Promise<boolean> {
    const apiKey = req.header('x-api-key')
    const bearer = /^Bearer\s+(.+)$/i.exec(req.header('authorization') ?? '')?.[1]

    let user: User | null
    if (apiKey) {
      user = await this.users.findByApiKey(apiKey)
      if (!user) throw new UnauthorizedException('Invalid or inactive API key')
    } else if (bearer) {
      user = await this.auth.resolveAccessToken(bearer)
      if (!user) throw new UnauthorizedException('Invalid or expired access token')
    } else {
      throw new UnauthorizedException('API key required. Get yours at /auth/register')
    }

    req.authUser = { userId: user.id, email: user.email, tier: user.subscriptionTier }
    return true
  }
}
