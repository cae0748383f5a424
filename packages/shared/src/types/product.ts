import type { PlanTier } from './common'

export interface Plan {
  name: string
  // Smallest currency unit (toman)
  price: number
  downloadLink: string
}

export interface Product {
  key: string
  title: string
  description: string
  coverImage: string
  plans: Record<PlanTier, Plan>
}

export interface ProductSummary {
  key: string
  title: string
}

export interface PlanOffer extends Plan {
  tier: PlanTier
}
