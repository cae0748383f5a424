// packages/bot/src/payments/idpay.ts - IDPay gateway
import { GatewayAdapter, isRecord } from './base'
import type { VerifyCall } from './types'

const PAY_URL = 'https://idpay.ir/p'
const VERIFY_URL = 'https://api.idpay.ir/v1.1/payment/verify'

export class IdPayAdapter extends GatewayAdapter {
  readonly provider = 'idpay'
  protected readonly tokenBytes = 10

  protected redirectUrl(id: string): string {
    return `${PAY_URL}/${id}`
  }

  protected verifyCall(apiKey: string, id: string): VerifyCall {
    return {
      url: VERIFY_URL,
      headers: { 'X-API-KEY': apiKey },
      body: { id },
    }
  }

  protected isPaid(body: unknown): boolean {
    return isRecord(body) && body.status === 100
  }
}
