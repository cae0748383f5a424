export const PAYMENT_PROVIDERS = ['zarinpal', 'idpay', 'nextpay'] as const

export const PLAN_TIERS = ['economic', 'golden'] as const

export const PROVIDER_LABELS = {
  zarinpal: 'زرین‌پال',
  idpay: 'IDPay',
  nextpay: 'NextPay',
} as const

export const PLAN_ICONS = {
  economic: '🟢',
  golden: '💎',
} as const

// Leading words accepted before a purchase id in a receipt message
export const PROOF_LABELS = ['تراکنش', 'tx', 'txn', 'transaction'] as const

export const CURRENCY_LABEL = 'تومان'

export const DEFAULT_PAYMENT_GATEWAY = 'zarinpal'

export const RATE_LIMITS = {
  bot: {
    window: 2000, // 2 seconds
    maxRequests: 3
  }
} as const
