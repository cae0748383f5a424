// packages/bot/src/payments/zarinpal.ts - Zarinpal gateway
import { GatewayAdapter, isRecord } from './base'
import type { VerifyCall } from './types'

const START_PAY_URL = 'https://www.zarinpal.com/pg/StartPay'
const VERIFY_URL = 'https://api.zarinpal.com/pg/v4/payment/verify.json'

// 100 = verified now, 101 = verified by an earlier call
const PAID_CODES = [100, 101]

export class ZarinpalAdapter extends GatewayAdapter {
  readonly provider = 'zarinpal'
  protected readonly tokenBytes = 12

  protected redirectUrl(authority: string): string {
    return `${START_PAY_URL}/${authority}`
  }

  protected verifyCall(merchantId: string, authority: string, amount: number): VerifyCall {
    return {
      url: VERIFY_URL,
      // Zarinpal settles in rial, prices are stored in toman
      body: { merchant_id: merchantId, authority, amount: amount * 10 },
    }
  }

  protected isPaid(body: unknown): boolean {
    if (!isRecord(body) || !isRecord(body.data)) return false
    const code = body.data.code
    return typeof code === 'number' && PAID_CODES.includes(code)
  }
}
