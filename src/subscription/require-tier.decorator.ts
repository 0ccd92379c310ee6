import { SetMetadata } from '@nestjs/common'
import type { SubscriptionTier } from './subscription.types'

export const REQUIRED_TIER_KEY = 'requiredTier'

export const RequireTier = (tier: SubscriptionTier) => SetMetadata(REQUIRED_TIER_KEY, tier)
