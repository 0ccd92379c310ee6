import {
  BadRequestException,
  ForbiddenException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common'
import * as bcrypt from 'bcrypt'
import { randomBytes } from 'crypto'
import { JsonWebTokenError, sign, verify, type JwtPayload } from 'jsonwebtoken'
import { APP_CONFIG, type AppConfig } from '../config/app-config'
import { EmailTakenError } from '../users/users.errors'
import { UsersRepository } from '../users/users.repository'
import type { ApiKey, User, UserWithApiKey } from '../users/users.types'
import type { AccessToken } from './auth.types'
import type { ApiKeyResponseDto } from './dto/auth.dto'

const BCRYPT_ROUNDS = 10

export function generateApiKey(): string {
  return `vo_${randomBytes(48).toString('base64url')}`
}

const toApiKeyResponse = (key: ApiKey): ApiKeyResponseDto => ({
  id: key.id,
  key: key.key,
  name: key.name,
  createdAt: key.createdAt,
  lastUsedAt: key.lastUsedAt,
})

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name)

  constructor(
    private readonly users: UsersRepository,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  async register(email: string, password: string): Promise<AccessToken & { apiKey: string }> {
    const existing = await this.users.findByEmail(email)
    if (existing) {
      throw new BadRequestException('Email already registered')
    }

    const hashedPassword = await bcrypt.hash(password, BCRYPT_ROUNDS)
    let created: UserWithApiKey
    try {
      created = await this.users.createWithApiKey(email, hashedPassword, {
        key: generateApiKey(),
        name: 'Default API Key',
      })
    } catch (err) {
      // a concurrent registration won the race after the check above
      if (err instanceof EmailTakenError) throw new BadRequestException('Email already registered')
      throw err
    }
    const { user, apiKey } = created

    this.logger.log(`Registered user ${user.id} on the ${user.subscriptionTier} tier`)
    return { ...this.issueToken(user), apiKey: apiKey.key }
  }

  async login(email: string, password: string): Promise<AccessToken> {
    const user = await this.users.findByEmail(email)
    if (!user || !(await bcrypt.compare(password, user.hashedPassword))) {
      throw new UnauthorizedException('Incorrect email or password')
    }
    if (!user.isActive) {
      throw new ForbiddenException('Account is inactive')
    }
    return this.issueToken(user)
  }

  /** Resolves the active user behind a bearer token, or null for a bad or expired token. */
  async resolveAccessToken(token: string): Promise<User | null> {
    let payload: string | JwtPayload
    try {
      payload = verify(token, this.config.auth.jwtSecret, { algorithms: ['HS256'] })
    } catch (err) {
      if (err instanceof JsonWebTokenError) return null
      throw err
    }
    if (typeof payload === 'string' || typeof payload.sub !== 'string') return null

    const user = await this.users.findByEmail(payload.sub)
    return user?.isActive ? user : null
  }

  async profile(userId: number) {
    const user = await this.users.findById(userId)
    if (!user) {
      throw new NotFoundException('User not found')
    }
    return {
      id: user.id,
      email: user.email,
      subscriptionTier: user.subscriptionTier,
      isActive: user.isActive,
      createdAt: user.createdAt,
    }
  }

  async createApiKey(userId: number, name: string): Promise<ApiKeyResponseDto> {
    return toApiKeyResponse(await this.users.createApiKey(userId, generateApiKey(), name))
  }

  async listApiKeys(userId: number): Promise<ApiKeyResponseDto[]> {
    const keys = await this.users.listApiKeys(userId)
    return keys.map(toApiKeyResponse)
  }

  async deleteApiKey(userId: number, keyId: number): Promise<{ message: string }> {
    const deleted = await this.users.deleteApiKey(userId, keyId)
    if (!deleted) {
      throw new NotFoundException('API key not found')
    }
    return { message: 'API key deleted successfully' }
  }

  private issueToken(user: User): AccessToken {
    const accessToken = sign({ sub: user.email }, this.config.auth.jwtSecret, {
      algorithm: 'HS256',
      expiresIn: this.config.auth.accessTokenExpireMinutes * 60,
    })
    return { accessToken, tokenType: 'bearer' }
  }
}
