// packages/bot/src/utils/formatter.ts - Formatting helpers
import { format, fromUnixTime } from 'date-fns'
import { CURRENCY_LABEL, PROVIDER_LABELS } from '@fileshop/shared'
import type { PaymentProvider } from '@fileshop/shared'

const numberFormatter = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 })

export function formatAmount(amount: number): string {
  return `${numberFormatter.format(amount)} ${CURRENCY_LABEL}`
}

export function formatTimestamp(unixSeconds: number, formatStr = 'yyyy-MM-dd HH:mm:ss'): string {
  return format(fromUnixTime(unixSeconds), formatStr)
}

export function formatProvider(provider: PaymentProvider): string {
  return PROVIDER_LABELS[provider]
}

// Escape HTML
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
}
