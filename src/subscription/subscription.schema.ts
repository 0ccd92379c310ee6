import { z } from 'zod'
import { muscleGroupSchema } from '../volume/volume.schema'
import { SUBSCRIPTION_TIERS } from './subscription.types'

export const subscriptionTierSchema = z.enum(SUBSCRIPTION_TIERS)

export const subscriptionInfoSchema = z.object({
  tier: subscriptionTierSchema,
  dailyLimit: z.number().int().nonnegative(),
  usageToday: z.number().int().nonnegative(),
  availableMuscleGroups: z.array(muscleGroupSchema).min(1),
})
