import type { SubscriptionTier } from '../subscription/subscription.types'

export type User = {
  id: number
  email: string
  hashedPassword: string
  isActive: boolean
  subscriptionTier: SubscriptionTier
  createdAt: Date
  updatedAt: Date
}

export type ApiKey = {
  id: number
  key: string
  name: string
  userId: number
  isActive: boolean
  createdAt: Date
  lastUsedAt: Date | null
}

export type NewApiKey = {
  key: string
  name: string
}

export type UserWithApiKey = {
  user: User
  apiKey: ApiKey
}
