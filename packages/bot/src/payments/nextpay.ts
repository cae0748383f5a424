// packages/bot/src/payments/nextpay.ts - NextPay gateway
import { GatewayAdapter, isRecord } from './base'
import type { VerifyCall } from './types'

const PAYMENT_URL = 'https://nextpay.org/nx/gateway/payment'
const VERIFY_URL = 'https://nextpay.org/nx/gateway/verify'

export class NextPayAdapter extends GatewayAdapter {
  readonly provider = 'nextpay'
  protected readonly tokenBytes = 10

  protected redirectUrl(token: string): string {
    return `${PAYMENT_URL}/${token}`
  }

  protected verifyCall(apiKey: string, token: string): VerifyCall {
    return {
      url: VERIFY_URL,
      body: { token, api_key: apiKey },
    }
  }

  protected isPaid(body: unknown): boolean {
    return isRecord(body) && body.status === 1
  }
}
