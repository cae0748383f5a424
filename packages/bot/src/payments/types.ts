// packages/bot/src/payments/types.ts - Gateway capability interface
import type { PaymentLink, PaymentProvider } from '@fileshop/shared'

export interface PaymentAdapter {
  readonly provider: PaymentProvider

  // True when a credential for this gateway is present right now
  isConfigured(): boolean

  createLink(amount: number, description: string): PaymentLink

  // Never rejects; transport and API failures resolve to false
  verify(reference: string, amount: number): Promise<boolean>
}

export interface AdapterOptions {
  credential: () => string | undefined
  timeoutMs: number
}

export interface VerifyCall {
  url: string
  headers?: Record<string, string>
  body: Record<string, unknown>
}
