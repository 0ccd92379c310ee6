import { UnauthorizedException } from '@nestjs/common'
import type { Request } from 'express'
import type { SubscriptionTier } from '../subscription/subscription.types'

export type AuthUser = {
  userId: number
  email: string
  tier: SubscriptionTier
}

export type AuthedRequest = Request & { authUser?: AuthUser }

/** The part of a request the auth guard reads and writes. */
export type AuthCandidate = {
  header(name: string): string | undefined
  authUser?: AuthUser
}

export type AccessToken = {
  accessToken: string
  tokenType: 'bearer'
}

export function requireAuthUser(req: { authUser?: AuthUser }): AuthUser {
  if (!req.authUser) {
    throw new UnauthorizedException('API key required. Get yours at /auth/register')
  }
  return req.authUser
}
