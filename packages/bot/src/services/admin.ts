// packages/bot/src/services/admin.ts - Administrator operations
import { PAYMENT_PROVIDERS, isPaymentProvider } from '@fileshop/shared'
import type { PaymentProvider, PurchaseListing } from '@fileshop/shared'
import type { SettingsStore } from '../config/settings'
import type { PurchaseLedger } from './ledger'
import { InvalidInputError, UnauthorizedError } from '../errors'
import { createLogger } from '../utils/logger'

const log = createLogger('admin')

export interface PurchaseReport {
  total: number
  paid: number
  purchases: PurchaseListing[]
}

export class AdminService {
  constructor(
    private readonly settings: SettingsStore,
    private readonly ledger: PurchaseLedger
  ) {}

  isAdmin(callerId: number): boolean {
    return this.settings.isAdmin(callerId)
  }

  assertAdmin(callerId: number): void {
    if (!this.isAdmin(callerId)) {
      log.warn({ callerId }, 'Rejected admin operation')
      throw new UnauthorizedError(callerId)
    }
  }

  listPurchases(callerId: number, limit: number): PurchaseReport {
    this.assertAdmin(callerId)
    return {
      ...this.ledger.countPurchases(),
      purchases: this.ledger.listAll(limit),
    }
  }

  async setDefaultGateway(callerId: number, name: string): Promise<PaymentProvider> {
    this.assertAdmin(callerId)

    const gateway = name.trim().toLowerCase()
    if (!isPaymentProvider(gateway)) {
      throw new InvalidInputError(
        'unknown_gateway',
        `unknown gateway "${name}", expected one of ${PAYMENT_PROVIDERS.join(', ')}`
      )
    }

    await this.settings.update({ payment_gateway: gateway })
    log.info({ callerId, gateway }, 'Default payment gateway changed')
    return gateway
  }
}
