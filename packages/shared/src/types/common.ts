import type { PAYMENT_PROVIDERS, PLAN_TIERS } from '../constants'

export type PaymentProvider = (typeof PAYMENT_PROVIDERS)[number]

export type PlanTier = (typeof PLAN_TIERS)[number]

// Unix seconds
export type Timestamp = number
