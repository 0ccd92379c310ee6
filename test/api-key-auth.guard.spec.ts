import { UnauthorizedException } from '@nestjs/common'
import { ApiKeyAuthGuard } from '../src/auth/api-key-auth.guard'
import { AuthService } from '../src/auth/auth.service'
import type { AuthCandidate } from '../src/auth/auth.types'
import { FixedClock, InMemoryUsersRepository } from './support/in-memory-repositories'
import { TEST_NOW, testConfig } from './support/fixtures'

function candidate(headers: Record<string, string>): AuthCandidate {
  return { header: (name) => headers[name.toLowerCase()] }
}

describe('ApiKeyAuthGuard', () => {
  let users: InMemoryUsersRepository
  let auth: AuthService
  let guard: ApiKeyAuthGuard
  let apiKey: string
  let accessToken: string

  beforeEach(async () => {
    users = new InMemoryUsersRepository(new FixedClock(TEST_NOW))
    auth = new AuthService(users, testConfig())
    guard = new ApiKeyAuthGuard(users, auth)

    const registered = await auth.register('lifter@example.test', 'password123')
    apiKey = registered.apiKey
    accessToken = registered.accessToken
  })

  it('attaches the user behind a valid API key and marks the key used', async () => {
    const req = candidate({ 'x-api-key': apiKey })

    await expect(guard.authenticate(req)).resolves.toBe(true)
    expect(req.authUser).toEqual({ userId: 1, email: 'lifter@example.test', tier: 'free' })
    expect(users.apiKeys[0]?.lastUsedAt).toEqual(TEST_NOW)
  })

  it('accepts a bearer token', async () => {
    const req = candidate({ authorization: `Bearer ${accessToken}` })

    await expect(guard.authenticate(req)).resolves.toBe(true)
    expect(req.authUser).toEqual({ userId: 1, email: 'lifter@example.test', tier: 'free' })
  })

  it('reflects the current tier of the user', async () => {
    await users.updateTier(1, 'pro')
    const req = candidate({ 'x-api-key': apiKey })

    await guard.authenticate(req)
    expect(req.authUser?.tier).toBe('pro')
  })

  it('rejects a request without credentials', async () => {
    await expect(guard.authenticate(candidate({}))).rejects.toThrow(
      new UnauthorizedException('API key required. Get yours at /auth/register'),
    )
  })

  it('rejects an unknown or deactivated key', async () => {
    await expect(guard.authenticate(candidate({ 'x-api-key': 'vo_unknown' }))).rejects.toThrow(
      new UnauthorizedException('Invalid or inactive API key'),
    )

    const key = users.apiKeys[0]
    if (key) key.isActive = false
    await expect(guard.authenticate(candidate({ 'x-api-key': apiKey }))).rejects.toThrow(UnauthorizedException)
  })

  it('rejects an invalid bearer token', async () => {
    await expect(guard.authenticate(candidate({ authorization: 'Bearer not-a-jwt' }))).rejects.toThrow(
      new UnauthorizedException('Invalid or expired access token'),
    )
  })

  it('prefers the API key when both are sent', async () => {
    const req = candidate({ 'x-api-key': 'vo_unknown', authorization: `Bearer ${accessToken}` })

    await expect(guard.authenticate(req)).rejects.toThrow(new UnauthorizedException('Invalid or inactive API key'))
  })
})
