// packages/bot/src/keyboards/main.ts - Inline keyboards
import { InlineKeyboard } from 'grammy'
import { PAYMENT_PROVIDERS, PLAN_ICONS } from '@fileshop/shared'
import type { PaymentProvider, PlanOffer, PlanTier } from '@fileshop/shared'
import { formatAmount, formatProvider } from '../utils/formatter'

export const callbackData = {
  buy: (productKey: string, tier: PlanTier) => `buy|${productKey}|${tier}`,
  startPay: (productKey: string, tier: PlanTier, provider: PaymentProvider) =>
    `startpay|${productKey}|${tier}|${provider}`,
} as const

export const planKeyboard = (productKey: string, offers: PlanOffer[]): InlineKeyboard =>
  InlineKeyboard.from(
    offers.map(offer => [
      InlineKeyboard.text(
        `${PLAN_ICONS[offer.tier]} ${offer.name} — ${formatAmount(offer.price)}`,
        callbackData.buy(productKey, offer.tier)
      ),
    ])
  )

// The default gateway comes first and is starred
export const providerKeyboard = (
  productKey: string,
  tier: PlanTier,
  defaultProvider: PaymentProvider
): InlineKeyboard => {
  const ordered = [defaultProvider, ...PAYMENT_PROVIDERS.filter(p => p !== defaultProvider)]

  return InlineKeyboard.from(
    ordered.map(provider => [
      InlineKeyboard.text(
        provider === defaultProvider ? `⭐ ${formatProvider(provider)}` : formatProvider(provider),
        callbackData.startPay(productKey, tier, provider)
      ),
    ])
  )
}
