// packages/bot/src/payments/index.ts - Gateway registry
import type { PaymentProvider } from '@fileshop/shared'
import type { SettingsStore } from '../config/settings'
import type { AdapterOptions, PaymentAdapter } from './types'
import { ZarinpalAdapter } from './zarinpal'
import { IdPayAdapter } from './idpay'
import { NextPayAdapter } from './nextpay'

export type { PaymentAdapter } from './types'

export type PaymentAdapters = Readonly<Record<PaymentProvider, PaymentAdapter>>

export function createAdapter(provider: PaymentProvider, options: AdapterOptions): PaymentAdapter {
  switch (provider) {
    case 'zarinpal':
      return new ZarinpalAdapter(options)
    case 'idpay':
      return new IdPayAdapter(options)
    case 'nextpay':
      return new NextPayAdapter(options)
    default: {
      const unknownProvider: never = provider
      throw new Error(`Unsupported payment provider: ${String(unknownProvider)}`)
    }
  }
}

export function createPaymentAdapters(
  settings: SettingsStore,
  options: { timeoutMs: number }
): PaymentAdapters {
  const build = (provider: PaymentProvider): PaymentAdapter =>
    createAdapter(provider, {
      ...options,
      credential: () => settings.credentialFor(provider),
    })

  return {
    zarinpal: build('zarinpal'),
    idpay: build('idpay'),
    nextpay: build('nextpay'),
  }
}

