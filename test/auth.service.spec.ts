import { BadRequestException, ForbiddenException, NotFoundException, UnauthorizedException } from '@nestjs/common'
import { sign } from 'jsonwebtoken'
import { AuthService, generateApiKey } from '../src/auth/auth.service'
import { FixedClock, InMemoryUsersRepository } from './support/in-memory-repositories'
import { TEST_NOW, testConfig } from './support/fixtures'

describe('AuthService', () => {
  let users: InMemoryUsersRepository
  let service: AuthService

  beforeEach(() => {
    users = new InMemoryUsersRepository(new FixedClock(TEST_NOW))
    service = new AuthService(users, testConfig())
  })

  it('generates prefixed url-safe keys', () => {
    const key = generateApiKey()
    expect(key).toMatch(/^vo_[A-Za-z0-9_-]{64}$/)
    expect(generateApiKey()).not.toBe(key)
  })

  describe('register', () => {
    it('creates a free user with a hashed password and a default API key', async () => {
      const res = await service.register('lifter@example.test', 'password123')

      expect(res.tokenType).toBe('bearer')
      expect(res.apiKey).toMatch(/^vo_/)
      expect(users.users).toHaveLength(1)
      expect(users.users[0]).toMatchObject({ email: 'lifter@example.test', subscriptionTier: 'free', isActive: true })
      expect(users.users[0]?.hashedPassword).not.toBe('password123')
      expect(users.apiKeys).toEqual([expect.objectContaining({ userId: 1, name: 'Default API Key', key: res.apiKey })])
    })

    it('maps a duplicate insert to the same 400 when two registrations race', async () => {
      const results = await Promise.allSettled([
        service.register('lifter@example.test', 'password123'),
        service.register('lifter@example.test', 'password123'),
      ])

      expect(results.map((r) => r.status).sort()).toEqual(['fulfilled', 'rejected'])
      const rejected = results.find((r): r is PromiseRejectedResult => r.status === 'rejected')
      expect(rejected?.reason).toEqual(new BadRequestException('Email already registered'))
      expect(users.users).toHaveLength(1)
      expect(users.apiKeys).toHaveLength(1)
    })

    it('passes through storage failures other than a taken email', async () => {
      const failure = new Error('connection terminated')
      jest.spyOn(users, 'createWithApiKey').mockRejectedValueOnce(failure)

      await expect(service.register('lifter@example.test', 'password123')).rejects.toBe(failure)
      expect(users.users).toEqual([])
    })

    it('rejects a duplicate email', async () => {
      await service.register('lifter@example.test', 'password123')

      await expect(service.register('lifter@example.test', 'another-pass')).rejects.toThrow(
        new BadRequestException('Email already registered'),
      )
    })
  })

  describe('login', () => {
    beforeEach(async () => {
      await service.register('lifter@example.test', 'password123')
    })

    it('returns a token that resolves back to the user', async () => {
      const { accessToken, tokenType } = await service.login('lifter@example.test', 'password123')

      expect(tokenType).toBe('bearer')
      await expect(service.resolveAccessToken(accessToken)).resolves.toMatchObject({
        id: 1,
        email: 'lifter@example.test',
      })
    })

    it('rejects a wrong password and an unknown email alike', async () => {
      const expected = new UnauthorizedException('Incorrect email or password')

      await expect(service.login('lifter@example.test', 'wrong-password')).rejects.toThrow(expected)
      await expect(service.login('nobody@example.test', 'password123')).rejects.toThrow(expected)
    })

    it('rejects an inactive account', async () => {
      const user = users.users[0]
      if (user) user.isActive = false

      await expect(service.login('lifter@example.test', 'password123')).rejects.toThrow(ForbiddenException)
    })
  })

  describe('resolveAccessToken', () => {
    beforeEach(async () => {
      await service.register('lifter@example.test', 'password123')
    })

    it('returns null for a token signed with another secret', async () => {
      const token = sign({ sub: 'lifter@example.test' }, 'other-secret', { algorithm: 'HS256' })
      await expect(service.resolveAccessToken(token)).resolves.toBeNull()
    })

    it('returns null for an expired token', async () => {
      const token = sign({ sub: 'lifter@example.test', exp: Math.floor(Date.now() / 1000) - 60 }, 'test-secret')
      await expect(service.resolveAccessToken(token)).resolves.toBeNull()
    })

    it('returns null for garbage and for a token without a subject', async () => {
      await expect(service.resolveAccessToken('not-a-jwt')).resolves.toBeNull()
      await expect(service.resolveAccessToken(sign({ role: 'x' }, 'test-secret'))).resolves.toBeNull()
    })

    it('returns null when the user is inactive', async () => {
      const { accessToken } = await service.login('lifter@example.test', 'password123')
      const user = users.users[0]
      if (user) user.isActive = false

      await expect(service.resolveAccessToken(accessToken)).resolves.toBeNull()
    })
  })

  describe('API keys', () => {
    beforeEach(async () => {
      await service.register('lifter@example.test', 'password123')
    })

    it('creates and lists keys of the user', async () => {
      const created = await service.createApiKey(1, 'ci')

      expect(created).toEqual({
        id: 2,
        key: expect.stringMatching(/^vo_/),
        name: 'ci',
        createdAt: TEST_NOW,
        lastUsedAt: null,
      })
      await expect(service.listApiKeys(1)).resolves.toHaveLength(2)
      await expect(service.listApiKeys(99)).resolves.toEqual([])
    })

    it('deletes only keys owned by the user', async () => {
      const created = await service.createApiKey(1, 'ci')

      await expect(service.deleteApiKey(99, created.id)).rejects.toThrow(new NotFoundException('API key not found'))
      await expect(service.deleteApiKey(1, created.id)).resolves.toEqual({ message: 'API key deleted successfully' })
      await expect(service.listApiKeys(1)).resolves.toHaveLength(1)
    })
  })

  it('returns the profile without the password hash', async () => {
    await service.register('lifter@example.test', 'password123')

    await expect(service.profile(1)).resolves.toEqual({
      id: 1,
      email: 'lifter@example.test',
      subscriptionTier: 'free',
      isActive: true,
      createdAt: TEST_NOW,
    })
    await expect(service.profile(2)).rejects.toThrow(NotFoundException)
  })
})
