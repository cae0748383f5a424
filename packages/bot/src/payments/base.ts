// packages/bot/src/payments/base.ts - Shared gateway behaviour
import { generateUrlSafeToken } from '@fileshop/shared'
import type { PaymentLink, PaymentProvider } from '@fileshop/shared'
import type { AdapterOptions, PaymentAdapter, VerifyCall } from './types'
import { createLogger } from '../utils/logger'

const log = createLogger('payments')

export abstract class GatewayAdapter implements PaymentAdapter {
  abstract readonly provider: PaymentProvider
  protected abstract readonly tokenBytes: number

  constructor(protected readonly options: AdapterOptions) {}

  protected abstract redirectUrl(reference: string): string

  protected abstract verifyCall(credential: string, reference: string, amount: number): VerifyCall

  // Interprets the decoded JSON body of a verify response
  protected abstract isPaid(body: unknown): boolean

  isConfigured(): boolean {
    return this.options.credential() !== undefined
  }

  createLink(amount: number, description: string): PaymentLink {
    const reference = generateUrlSafeToken(this.tokenBytes)
    const url = this.redirectUrl(reference)
    log.debug({ provider: this.provider, amount, description, reference }, 'Payment link issued')
    return { reference, url }
  }

  async verify(reference: string, amount: number): Promise<boolean> {
    const credential = this.options.credential()
    if (credential === undefined) {
      return false
    }

    const call = this.verifyCall(credential, reference, amount)
    try {
      const response = await fetch(call.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...call.headers },
        body: JSON.stringify(call.body),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      })
      const body: unknown = await response.json()
      const paid = this.isPaid(body)

      log.info({ provider: this.provider, status: response.status, paid }, 'Gateway verification finished')
      return paid
    } catch (error) {
      log.warn(
        { provider: this.provider, error: error instanceof Error ? error.message : String(error) },
        'Provider verification error'
      )
      return false
    }
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
