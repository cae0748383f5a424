import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { Mock } from 'vitest'
import { rmSync } from 'fs'
import path from 'path'
import { InvalidInputError, NotFoundError } from '../src/errors'
import { createTestShop, jsonResponse, productDefinition, writeProduct } from './helpers/workspace'
import type { TestShop } from './helpers/workspace'

const U1 = { telegramId: 1001, username: 'U1' }
const U2 = { telegramId: 1002, username: 'U2' }

describe('CheckoutService', () => {
  let shop: TestShop
  let fetchMock: Mock<typeof fetch>

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>()
    vi.stubGlobal('fetch', fetchMock)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
    shop.cleanup()
  })

  describe('browse', () => {
    beforeEach(() => {
      shop = createTestShop()
    })

    it('offers both tiers at their stored prices', () => {
      writeProduct(shop.productsDir, 'p2', productDefinition('p2', { economic: 1500, golden: 990000 }))

      for (const [key, economic, golden] of [
        ['p1', 10000, 25000],
        ['p2', 1500, 990000],
      ] as const) {
        const { product, offers } = shop.services.checkout.browse(key)

        expect(product.key).toBe(key)
        expect(offers.map(o => [o.tier, o.price])).toEqual([
          ['economic', economic],
          ['golden', golden],
        ])
      }
    })

    it('throws NotFoundError for an unknown product', () => {
      expect(() => shop.services.checkout.browse('missing')).toThrow(NotFoundError)
    })
  })

  describe('beginCheckout', () => {
    beforeEach(() => {
      shop = createTestShop({ settings: { payment_gateway: 'nextpay' } })
    })

    it('creates a pending purchase through the chosen provider', () => {
      const started = shop.services.checkout.beginCheckout(U1, 'p1', 'golden', 'idpay')

      expect(started.url).toBe(`https://idpay.ir/p/${started.reference}`)
      expect(started.amount).toBe(25000)
      expect(shop.services.ledger.getPurchase(started.purchaseId)).toMatchObject({
        productId: 'p1',
        plan: 'golden',
        provider: 'idpay',
        providerRef: started.reference,
        amount: 25000,
        success: false,
      })
    })

    it('falls back to the configured default gateway', () => {
      const started = shop.services.checkout.beginCheckout(U1, 'p1', 'economic')

      expect(started.provider).toBe('nextpay')
      expect(started.url.startsWith('https://nextpay.org/nx/gateway/payment/')).toBe(true)
    })

    it('keeps the price it was bought at when the catalog changes later', () => {
      const started = shop.services.checkout.beginCheckout(U1, 'p1', 'economic', 'idpay')
      writeProduct(shop.productsDir, 'p1', productDefinition('p1', { economic: 99000, golden: 25000 }))

      expect(shop.services.ledger.getPurchase(started.purchaseId).amount).toBe(10000)
      expect(shop.services.checkout.browse('p1').offers[0]?.price).toBe(99000)
    })

    it('rejects an unknown plan without creating anything', () => {
      expect(() => shop.services.checkout.beginCheckout(U1, 'p1', 'platinum')).toThrow(NotFoundError)
      expect(shop.services.ledger.countPurchases()).toEqual({ total: 0, paid: 0 })
      expect(shop.services.ledger.getUserByTelegramId(U1.telegramId)).toBeNull()
    })

    it('rejects an unknown product', () => {
      expect(() => shop.services.checkout.beginCheckout(U1, 'nope', 'economic')).toThrow(NotFoundError)
    })
  })

  describe('submitProof without credentials', () => {
    beforeEach(() => {
      shop = createTestShop()
    })

    it('fulfils a purchase named by id and stores the proof', async () => {
      const started = shop.services.checkout.beginCheckout(U1, 'p1', 'economic', 'idpay')
      expect(started.reference).toMatch(/^[A-Za-z0-9_-]+$/)

      const result = await shop.services.checkout.submitProof(U1, `تراکنش ${started.purchaseId} abc123`)

      expect(result).toMatchObject({
        status: 'fulfilled',
        downloadLink: 'https://example.com/p1/economic.zip',
        mode: 'auto-accept',
        alreadyFulfilled: false,
      })
      expect(shop.services.ledger.getPurchase(started.purchaseId)).toMatchObject({
        success: true,
        providerRef: 'abc123',
      })
      expect(fetchMock).not.toHaveBeenCalled()
    })

    it('accepts any non-empty proof for the latest pending purchase', async () => {
      const started = shop.services.checkout.beginCheckout(U1, 'p1', 'golden', 'zarinpal')

      const result = await shop.services.checkout.submitProof(U1, 'paid!')

      expect(result.status).toBe('fulfilled')
      expect(result.purchase.id).toBe(started.purchaseId)
      expect(result.purchase.providerRef).toBe('paid!')
    })

    it('returns the download link again for a purchase that is already paid', async () => {
      const started = shop.services.checkout.beginCheckout(U1, 'p1', 'economic', 'idpay')
      await shop.services.checkout.submitProof(U1, `${started.purchaseId} first`)

      const again = await shop.services.checkout.submitProof(U1, `${started.purchaseId} second`)

      expect(again).toMatchObject({
        status: 'fulfilled',
        downloadLink: 'https://example.com/p1/economic.zip',
        mode: null,
        alreadyFulfilled: true,
      })
      expect(shop.services.ledger.getPurchase(started.purchaseId).providerRef).toBe('first')
    })

    it('throws InvalidInputError for blank text', async () => {
      await expect(shop.services.checkout.submitProof(U1, '   ')).rejects.toBeInstanceOf(InvalidInputError)
    })

    it('fails without writing when the product has been removed', async () => {
      const started = shop.services.checkout.beginCheckout(U1, 'p1', 'economic', 'idpay')
      rmSync(path.join(shop.productsDir, 'p1'), { recursive: true, force: true })

      await expect(
        shop.services.checkout.submitProof(U1, `تراکنش ${started.purchaseId} abc123`)
      ).rejects.toMatchObject({ resource: 'product' })
      expect(shop.services.ledger.getPurchase(started.purchaseId).success).toBe(false)
    })
  })

  describe('pending lookup scoped to the sender', () => {
    beforeEach(() => {
      shop = createTestShop({ pendingLookup: 'user' })
    })

    it("resolves the sender's own latest pending purchase", async () => {
      const own = shop.services.checkout.beginCheckout(U1, 'p1', 'economic', 'idpay')
      shop.advanceClock(10)
      const other = shop.services.checkout.beginCheckout(U2, 'p1', 'golden', 'idpay')

      const result = await shop.services.checkout.submitProof(U1, 'xyz')

      expect(result.purchase.id).toBe(own.purchaseId)
      expect(shop.services.ledger.getPurchase(other.purchaseId).success).toBe(false)
    })

    it("refuses an explicit id that belongs to someone else", async () => {
      const other = shop.services.checkout.beginCheckout(U2, 'p1', 'golden', 'idpay')

      await expect(
        shop.services.checkout.submitProof(U1, `tx ${other.purchaseId} xyz`)
      ).rejects.toMatchObject({ resource: 'purchase' })
      expect(shop.services.ledger.getPurchase(other.purchaseId).success).toBe(false)
    })

    it('reports a missing pending purchase for a sender who never bought', async () => {
      shop.services.checkout.beginCheckout(U2, 'p1', 'golden', 'idpay')

      await expect(shop.services.checkout.submitProof(U1, 'xyz')).rejects.toMatchObject({
        resource: 'pending_purchase',
      })
    })

    it('reports an unknown explicit id as a missing purchase', async () => {
      await expect(shop.services.checkout.submitProof(U1, '77 xyz')).rejects.toMatchObject({
        resource: 'purchase',
        key: 77,
      })
    })
  })

  describe('pending lookup across all users', () => {
    beforeEach(() => {
      shop = createTestShop({ pendingLookup: 'global' })
    })

    it('resolves the newest pending purchase whoever sends the proof', async () => {
      const older = shop.services.checkout.beginCheckout(U1, 'p1', 'economic', 'idpay')
      shop.advanceClock(10)
      const newer = shop.services.checkout.beginCheckout(U2, 'p1', 'golden', 'idpay')

      const result = await shop.services.checkout.submitProof(U1, 'xyz')

      expect(result.purchase.id).toBe(newer.purchaseId)
      expect(shop.services.ledger.getPurchase(newer.purchaseId).success).toBe(true)
      expect(shop.services.ledger.getPurchase(older.purchaseId).success).toBe(false)
    })

    it('accepts an explicit id from any sender', async () => {
      const other = shop.services.checkout.beginCheckout(U2, 'p1', 'golden', 'idpay')

      const result = await shop.services.checkout.submitProof(U1, `${other.purchaseId} xyz`)

      expect(result.purchase.id).toBe(other.purchaseId)
      expect(result.status).toBe('fulfilled')
    })
  })

  describe('proofs for a purchase that is already paid', () => {
    const PAID = { data: { code: 100 } }
    const FAILED = { data: { code: -9 } }

    beforeEach(() => {
      shop = createTestShop({
        pendingLookup: 'global',
        settings: { zarinpal_merchant_id: 'test-merchant' },
      })
    })

    it('does not release a paid purchase to another sender the gateway does not confirm', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(PAID))
      const started = shop.services.checkout.beginCheckout(U1, 'p1', 'golden', 'zarinpal')
      await shop.services.checkout.submitProof(U1, 'AUTH-1')

      fetchMock.mockResolvedValueOnce(jsonResponse(FAILED))
      const result = await shop.services.checkout.submitProof({ telegramId: 666 }, `${started.purchaseId} junk`)

      expect(result.status).toBe('rejected')
      expect(result).not.toHaveProperty('downloadLink')
      expect(fetchMock).toHaveBeenCalledTimes(2)
      expect(lastBody(fetchMock)).toEqual({ merchant_id: 'test-merchant', authority: 'junk', amount: 250000 })
      expect(shop.services.ledger.getPurchase(started.purchaseId).providerRef).toBe('AUTH-1')
    })

    it('releases it to another sender once the gateway confirms, without rewriting the proof', async () => {
      fetchMock.mockResolvedValue(jsonResponse(PAID))
      const started = shop.services.checkout.beginCheckout(U1, 'p1', 'golden', 'zarinpal')
      await shop.services.checkout.submitProof(U1, 'AUTH-1')

      const result = await shop.services.checkout.submitProof(U2, `${started.purchaseId} AUTH-2`)

      expect(result).toMatchObject({ status: 'fulfilled', mode: 'gateway', alreadyFulfilled: true })
      expect(shop.services.ledger.getPurchase(started.purchaseId).providerRef).toBe('AUTH-1')
    })

    it('rejects another sender outright when the provider has no credential', async () => {
      const started = shop.services.checkout.beginCheckout(U1, 'p1', 'economic', 'idpay')
      await shop.services.checkout.submitProof(U1, 'abc123')

      const result = await shop.services.checkout.submitProof(U2, `${started.purchaseId} abc123`)

      expect(result.status).toBe('rejected')
      expect(fetchMock).not.toHaveBeenCalled()
    })

    it('sends the buyer the link again without asking the gateway', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(PAID))
      const started = shop.services.checkout.beginCheckout(U1, 'p1', 'golden', 'zarinpal')
      await shop.services.checkout.submitProof(U1, 'AUTH-1')

      const result = await shop.services.checkout.submitProof(U1, `${started.purchaseId} AUTH-1`)

      expect(result).toMatchObject({ status: 'fulfilled', mode: null, alreadyFulfilled: true })
      expect(fetchMock).toHaveBeenCalledTimes(1)
    })
  })

  describe('submitProof with gateway credentials', () => {
    beforeEach(() => {
      shop = createTestShop({ settings: { zarinpal_merchant_id: 'test-merchant' } })
    })

    it('keeps the purchase pending when the gateway rejects the proof', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ data: { code: -9 } }))
      const started = shop.services.checkout.beginCheckout(U1, 'p1', 'economic', 'zarinpal')

      const result = await shop.services.checkout.submitProof(U1, 'bogus')

      expect(result.status).toBe('rejected')
      expect(result).not.toHaveProperty('downloadLink')
      expect(shop.services.ledger.getPurchase(started.purchaseId)).toMatchObject({
        success: false,
        providerRef: started.reference,
      })
    })

    it('fulfils once the gateway confirms the payment', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ data: { code: 100 } }))
      const started = shop.services.checkout.beginCheckout(U1, 'p1', 'golden', 'zarinpal')

      const result = await shop.services.checkout.submitProof(U1, 'AUTH-1')

      expect(result).toMatchObject({ status: 'fulfilled', mode: 'gateway' })
      expect(lastBody(fetchMock)).toEqual({ merchant_id: 'test-merchant', authority: 'AUTH-1', amount: 250000 })
      expect(shop.services.ledger.getPurchase(started.purchaseId).success).toBe(true)
    })

    it('writes nothing while verification is still in flight', async () => {
      let respond: (response: Response) => void = () => undefined
      fetchMock.mockImplementation(
        () =>
          new Promise<Response>(resolve => {
            respond = resolve
          })
      )
      const started = shop.services.checkout.beginCheckout(U1, 'p1', 'economic', 'zarinpal')

      const pending = shop.services.checkout.submitProof(U1, 'AUTH-2')
      expect(fetchMock).toHaveBeenCalledTimes(1)
      expect(shop.services.ledger.getPurchase(started.purchaseId).success).toBe(false)

      respond(jsonResponse({ data: { code: 100 } }))
      await expect(pending).resolves.toMatchObject({ status: 'fulfilled' })
      expect(shop.services.ledger.getPurchase(started.purchaseId).providerRef).toBe('AUTH-2')
    })

    it('auto-accepts purchases made through a provider without a credential', async () => {
      const started = shop.services.checkout.beginCheckout(U1, 'p1', 'economic', 'idpay')

      const result = await shop.services.checkout.submitProof(U1, 'abc123')

      expect(result).toMatchObject({ status: 'fulfilled', mode: 'auto-accept' })
      expect(result.purchase.id).toBe(started.purchaseId)
      expect(fetchMock).not.toHaveBeenCalled()
    })
  })
})

function lastBody(mock: Mock<typeof fetch>): unknown {
  const init = mock.mock.calls.at(-1)?.[1]
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined
}
