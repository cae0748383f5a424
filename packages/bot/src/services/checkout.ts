// packages/bot/src/services/checkout.ts - Purchase lifecycle
import { PLAN_TIERS, isPlanTier } from '@fileshop/shared'
import type {
  CustomerIdentity,
  PaymentProvider,
  Plan,
  PlanOffer,
  Product,
  Purchase,
  VerificationMode,
} from '@fileshop/shared'
import type { ProductCatalog } from './catalog'
import type { PurchaseLedger } from './ledger'
import type { SettingsStore } from '../config/settings'
import type { PaymentAdapters } from '../payments'
import { InvalidInputError, NotFoundError } from '../errors'
import { parseReceipt } from '../utils/receipt'
import { createLogger, logEvent } from '../utils/logger'

const log = createLogger('checkout')

// Whose pending purchase a receipt without an id applies to
export type PendingLookupScope = 'user' | 'global'

export interface ProductView {
  product: Product
  offers: PlanOffer[]
}

export interface CheckoutStarted {
  purchaseId: number
  provider: PaymentProvider
  reference: string
  url: string
  amount: number
  product: Product
  plan: Plan
}

export type ProofResult =
  | {
      status: 'fulfilled'
      purchase: Purchase
      product: Product
      plan: Plan
      downloadLink: string
      // null when the buyer resends a proof for a settled purchase
      mode: VerificationMode | null
      alreadyFulfilled: boolean
    }
  | {
      status: 'rejected'
      purchase: Purchase
    }

export interface CheckoutDeps {
  catalog: ProductCatalog
  ledger: PurchaseLedger
  adapters: PaymentAdapters
  settings: SettingsStore
  pendingLookup: PendingLookupScope
}

/**
 * PENDING --proof verified--> FULFILLED
 * PENDING --proof rejected--> PENDING
 * FULFILLED --proof from the buyer--> link sent again
 * FULFILLED --proof from anyone else--> gateway decides, no write
 *
 * Verification happens before any ledger write for the proof.
 */
export class CheckoutService {
  constructor(private readonly deps: CheckoutDeps) {}

  browse(productKey: string): ProductView {
    const product = this.deps.catalog.load(productKey)
    const offers = PLAN_TIERS.map((tier): PlanOffer => ({ tier, ...product.plans[tier] }))
    return { product, offers }
  }

  beginCheckout(
    customer: CustomerIdentity,
    productKey: string,
    tier: string,
    provider: PaymentProvider = this.deps.settings.current().payment_gateway
  ): CheckoutStarted {
    const product = this.deps.catalog.load(productKey)
    if (!isPlanTier(tier)) {
      throw new NotFoundError('plan', tier)
    }
    const plan = product.plans[tier]

    const link = this.deps.adapters[provider].createLink(plan.price, product.title)

    const userId = this.deps.ledger.ensureUser(customer)
    const purchaseId = this.deps.ledger.createPurchase({
      userId,
      productId: product.key,
      plan: tier,
      provider,
      providerRef: link.reference,
      amount: plan.price,
    })

    logEvent('checkout.started', { purchaseId, userId, productKey, tier, provider })

    return {
      purchaseId,
      provider,
      reference: link.reference,
      url: link.url,
      amount: plan.price,
      product,
      plan,
    }
  }

  async submitProof(customer: CustomerIdentity, text: string): Promise<ProofResult> {
    const receipt = parseReceipt(text)
    if (!receipt) {
      throw new InvalidInputError('empty_receipt', 'receipt text is empty')
    }

    const sender = this.deps.ledger.getUserByTelegramId(customer.telegramId)
    const purchase = this.resolvePurchase(sender?.id, receipt.purchaseId)

    // Resolve the fulfillment asset before touching the ledger
    const product = this.deps.catalog.load(purchase.productId)
    const plan = product.plans[purchase.plan]
    const fulfilled = (
      settled: Purchase,
      mode: VerificationMode | null,
      alreadyFulfilled: boolean
    ): ProofResult => ({
      status: 'fulfilled',
      purchase: settled,
      product,
      plan,
      downloadLink: plan.downloadLink,
      mode,
      alreadyFulfilled,
    })

    const adapter = this.deps.adapters[purchase.provider]

    if (purchase.success) {
      if (purchase.userId === sender?.id) {
        return fulfilled(purchase, null, true)
      }
      // Someone else's paid purchase is released only on a fresh gateway confirmation
      const confirmed = adapter.isConfigured() && (await adapter.verify(receipt.proof, purchase.amount))
      if (!confirmed) {
        log.info({ purchaseId: purchase.id, provider: purchase.provider }, 'Proof for a paid purchase rejected')
        return { status: 'rejected', purchase }
      }
      return fulfilled(purchase, 'gateway', true)
    }

    const mode: VerificationMode = adapter.isConfigured() ? 'gateway' : 'auto-accept'
    const verified = mode === 'auto-accept' || (await adapter.verify(receipt.proof, purchase.amount))

    if (!verified) {
      log.info({ purchaseId: purchase.id, provider: purchase.provider }, 'Payment proof rejected')
      return { status: 'rejected', purchase }
    }

    if (mode === 'auto-accept') {
      log.warn(
        {
          purchaseId: purchase.id,
          provider: purchase.provider,
          anyCredential: this.deps.settings.hasAnyCredential(),
        },
        'No gateway credential configured, accepting proof without verification'
      )
    }

    const marked = this.deps.ledger.markSuccess(purchase.id, receipt.proof)
    logEvent('purchase.fulfilled', { purchaseId: purchase.id, mode, marked })

    return fulfilled(this.deps.ledger.getPurchase(purchase.id), mode, !marked)
  }

  private resolvePurchase(senderId: number | undefined, purchaseId?: number): Purchase {
    const scoped = this.deps.pendingLookup === 'user'

    if (purchaseId !== undefined) {
      const purchase = this.deps.ledger.getPurchase(purchaseId)
      if (scoped && purchase.userId !== senderId) {
        throw new NotFoundError('purchase', purchaseId)
      }
      return purchase
    }

    let pending: Purchase | null = null
    if (!scoped) {
      pending = this.deps.ledger.latestPending()
    } else if (senderId !== undefined) {
      pending = this.deps.ledger.latestPending(senderId)
    }
    if (!pending) {
      throw new NotFoundError('pending_purchase')
    }
    return pending
  }
}
