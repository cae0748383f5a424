import type { PaymentProvider, PlanTier, Timestamp } from './common'

export interface ShopUser {
  id: number
  telegramId: number
  username: string
  createdAt: Timestamp
}

export interface Purchase {
  id: number
  userId: number
  productId: string
  plan: PlanTier
  provider: PaymentProvider
  providerRef: string
  amount: number
  success: boolean
  createdAt: Timestamp
}

export interface PurchaseListing extends Purchase {
  telegramId: number | null
  username: string | null
}

export interface CreatePurchaseDTO {
  userId: number
  productId: string
  plan: PlanTier
  provider: PaymentProvider
  providerRef: string
  amount: number
}

export interface CustomerIdentity {
  telegramId: number
  username?: string
}
