import { IsIn, IsOptional, IsString } from 'class-validator'
import type { PaidTier } from '../subscription.types'

export class UpgradeSubscriptionDto {
  @IsIn(['pro', 'enterprise'])
  tier!: PaidTier

  // reserved for a payment provider; not processed
  @IsOptional()
  @IsString()
  paymentMethodId?: string
}
