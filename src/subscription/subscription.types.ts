import { MUSCLE_GROUPS, type MuscleGroup } from '../volume/volume.types'

export const SUBSCRIPTION_TIERS = ['free', 'pro', 'enterprise'] as const

export type SubscriptionTier = (typeof SUBSCRIPTION_TIERS)[number]

export type PaidTier = Exclude<SubscriptionTier, 'free'>

const TIER_RANK: Record<SubscriptionTier, number> = { free: 0, pro: 1, enterprise: 2 }

export function tierRank(tier: SubscriptionTier): number {
  return TIER_RANK[tier]
}

export function hasTier(actual: SubscriptionTier, required: SubscriptionTier): boolean {
  return tierRank(actual) >= tierRank(required)
}

export function availableMuscleGroups(tier: SubscriptionTier): readonly MuscleGroup[] {
  return tier === 'free' ? ['chest'] : MUSCLE_GROUPS
}

export type SubscriptionInfo = {
  tier: SubscriptionTier
  dailyLimit: number
  usageToday: number
  availableMuscleGroups: readonly MuscleGroup[]
}
