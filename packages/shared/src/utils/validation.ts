import { PAYMENT_PROVIDERS, PLAN_TIERS } from '../constants'
import type { PaymentProvider, PlanTier } from '../types/common'

const SAFE_KEY = /^[A-Za-z0-9_-]+$/

// Catalog keys double as directory names
export function isSafeKey(key: string): boolean {
  return SAFE_KEY.test(key)
}

export function isPaymentProvider(value: string): value is PaymentProvider {
  return PAYMENT_PROVIDERS.some((provider) => provider === value)
}

export function isPlanTier(value: string): value is PlanTier {
  return PLAN_TIERS.some((tier) => tier === value)
}

export function parsePositiveInt(value: string): number | null {
  const digits = normalizeDigits(value)
  if (!/^\d+$/.test(digits)) return null
  const num = Number.parseInt(digits, 10)
  return Number.isSafeInteger(num) && num > 0 ? num : null
}

const PERSIAN_DIGITS = '۰۱۲۳۴۵۶۷۸۹'
const ARABIC_DIGITS = '٠١٢٣٤٥٦٧٨٩'

// Users often type ids with a Persian keyboard
export function normalizeDigits(value: string): string {
  return value.replace(/[۰-۹٠-٩]/g, ch => {
    const persian = PERSIAN_DIGITS.indexOf(ch)
    return String(persian >= 0 ? persian : ARABIC_DIGITS.indexOf(ch))
  })
}
