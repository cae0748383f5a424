// packages/bot/src/services/index.ts - Service wiring
import { SettingsStore } from '../config/settings'
import { createPaymentAdapters } from '../payments'
import type { PaymentAdapters } from '../payments'
import { ProductCatalog } from './catalog'
import { PurchaseLedger } from './ledger'
import { CheckoutService } from './checkout'
import type { PendingLookupScope } from './checkout'
import { AdminService } from './admin'

export interface ShopServices {
  settings: SettingsStore
  catalog: ProductCatalog
  ledger: PurchaseLedger
  adapters: PaymentAdapters
  checkout: CheckoutService
  admin: AdminService
  purchaseListLimit: number
}

export interface ShopServiceOptions {
  settings: SettingsStore
  productsDir: string
  databasePath: string
  pendingLookup: PendingLookupScope
  verifyTimeoutMs: number
  purchaseListLimit: number
  clock?: () => number
}

export function createShopServices(options: ShopServiceOptions): ShopServices {
  const { settings } = options
  const catalog = new ProductCatalog(options.productsDir)
  const ledger = new PurchaseLedger(options.databasePath, options.clock)
  const adapters = createPaymentAdapters(settings, { timeoutMs: options.verifyTimeoutMs })

  return {
    settings,
    catalog,
    ledger,
    adapters,
    checkout: new CheckoutService({
      catalog,
      ledger,
      adapters,
      settings,
      pendingLookup: options.pendingLookup,
    }),
    admin: new AdminService(settings, ledger),
    purchaseListLimit: options.purchaseListLimit,
  }
}
