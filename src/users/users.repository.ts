import type { SubscriptionTier } from '../subscription/subscription.types'
import type { ApiKey, NewApiKey, User, UserWithApiKey } from './users.types'

/** Storage for accounts and their API keys. Used as the DI token. */
export abstract class UsersRepository {
  /**
   * Creates the account together with its first API key, atomically.
   * Throws EmailTakenError when the email is already registered.
   */
  abstract createWithApiKey(email: string, hashedPassword: string, apiKey: NewApiKey): Promise<UserWithApiKey>
  abstract findById(id: number): Promise<User | null>
  abstract findByEmail(email: string): Promise<User | null>
  /**
   * Resolves the owner of an active key, provided the owner is active too.
   * Marks the key as used.
   */
  abstract findByApiKey(key: string): Promise<User | null>
  abstract updateTier(userId: number, tier: SubscriptionTier): Promise<User>
  abstract countByTier(): Promise<Record<SubscriptionTier, number>>

  abstract createApiKey(userId: number, key: string, name: string): Promise<ApiKey>
  abstract listApiKeys(userId: number): Promise<ApiKey[]>
  abstract deleteApiKey(userId: number, keyId: number): Promise<boolean>
}
