import { Injectable, NotFoundException } from '@nestjs/common'
import { DatabaseService, isUniqueViolation } from '../database/database.service'
import { SUBSCRIPTION_TIERS, type SubscriptionTier } from '../subscription/subscription.types'
import { subscriptionTierSchema } from '../subscription/subscription.schema'
import { EmailTakenError } from './users.errors'
import { UsersRepository } from './users.repository'
import type { ApiKey, NewApiKey, User, UserWithApiKey } from './users.types'

// default name Postgres gives the UNIQUE constraint on users.email
const USERS_EMAIL_UNIQUE = 'users_email_key'

type UserRow = {
  id: number
  email: string
  hashed_password: string
  is_active: boolean
  subscription_tier: string
  created_at: Date
  updated_at: Date
}

type ApiKeyRow = {
  id: number
  key: string
  name: string
  user_id: number
  is_active: boolean
  created_at: Date
  last_used_at: Date | null
}

const toUser = (row: UserRow): User => ({
  id: row.id,
  email: row.email,
  hashedPassword: row.hashed_password,
  isActive: row.is_active,
  subscriptionTier: subscriptionTierSchema.parse(row.subscription_tier),
  createdAt: row.created_at,
  updatedAt: row.updated_at,
})

const toApiKey = (row: ApiKeyRow): ApiKey => ({
  id: row.id,
  key: row.key,
  name: row.name,
  userId: row.user_id,
  isActive: row.is_active,
  createdAt: row.created_at,
  lastUsedAt: row.last_used_at,
})

@Injectable()
export class PgUsersRepository extends UsersRepository {
  constructor(private readonly db: DatabaseService) {
    super()
  }

  async createWithApiKey(email: string, hashedPassword: string, apiKey: NewApiKey): Promise<UserWithApiKey> {
    try {
      return await this.db.transaction(async (client) => {
        const users = await client.query<UserRow>(
          `INSERT INTO users (email, hashed_password) VALUES ($1, $2) RETURNING *`,
          [email, hashedPassword],
        )
        const user = toUser(this.first(users.rows))
        const keys = await client.query<ApiKeyRow>(
          `INSERT INTO api_keys (user_id, key, name) VALUES ($1, $2, $3) RETURNING *`,
          [user.id, apiKey.key, apiKey.name],
        )
        return { user, apiKey: toApiKey(this.first(keys.rows)) }
      })
    } catch (err) {
      if (isUniqueViolation(err, USERS_EMAIL_UNIQUE)) throw new EmailTakenError(email)
      throw err
    }
  }

  async findById(id: number): Promise<User | null> {
    const { rows } = await this.db.query<UserRow>(`SELECT * FROM users WHERE id = $1`, [id])
    return rows[0] ? toUser(rows[0]) : null
  }

  async findByEmail(email: string): Promise<User | null> {
    const { rows } = await this.db.query<UserRow>(`SELECT * FROM users WHERE email = $1`, [email])
    return rows[0] ? toUser(rows[0]) : null
  }

  async findByApiKey(key: string): Promise<User | null> {
    const { rows } = await this.db.query<UserRow>(
      `UPDATE api_keys k SET last_used_at = NOW()
         FROM users u
        WHERE k.key = $1 AND k.is_active AND u.id = k.user_id AND u.is_active
        RETURNING u.*`,
      [key],
    )
    return rows[0] ? toUser(rows[0]) : null
  }

  async updateTier(userId: number, tier: SubscriptionTier): Promise<User> {
    const { rows } = await this.db.query<UserRow>(
      `UPDATE users SET subscription_tier = $2, updated_at = NOW() WHERE id = $1 RETURNING *`,
      [userId, tier],
    )
    if (!rows[0]) throw new NotFoundException('User not found')
    return toUser(rows[0])
  }

  async countByTier(): Promise<Record<SubscriptionTier, number>> {
    const { rows } = await this.db.query<{ subscription_tier: string; count: number }>(
      `SELECT subscription_tier, COUNT(*)::int AS count FROM users GROUP BY subscription_tier`,
    )
    const counts: Record<SubscriptionTier, number> = { free: 0, pro: 0, enterprise: 0 }
    for (const row of rows) {
      const tier = SUBSCRIPTION_TIERS.find((t) => t === row.subscription_tier)
      if (tier) counts[tier] = row.count
    }
    return counts
  }

  async createApiKey(userId: number, key: string, name: string): Promise<ApiKey> {
    const { rows } = await this.db.query<ApiKeyRow>(
      `INSERT INTO api_keys (user_id, key, name) VALUES ($1, $2, $3) RETURNING *`,
      [userId, key, name],
    )
    return toApiKey(this.first(rows))
  }

  async listApiKeys(userId: number): Promise<ApiKey[]> {
    const { rows } = await this.db.query<ApiKeyRow>(
      `SELECT * FROM api_keys WHERE user_id = $1 ORDER BY created_at, id`,
      [userId],
    )
    return rows.map(toApiKey)
  }

  async deleteApiKey(userId: number, keyId: number): Promise<boolean> {
    const { rowCount } = await this.db.query(`DELETE FROM api_keys WHERE id = $1 AND user_id = $2`, [keyId, userId])
    return (rowCount ?? 0) > 0
  }

  private first<R>(rows: R[]): R {
    const row = rows[0]
    if (!row) throw new Error('INSERT ... RETURNING produced no row')
    return row
  }
}
