// packages/bot/src/services/ledger.ts - Users and purchases
import type Database from 'better-sqlite3'
import { isPaymentProvider, isPlanTier } from '@fileshop/shared'
import type {
  CreatePurchaseDTO,
  CustomerIdentity,
  Purchase,
  PurchaseListing,
  ShopUser,
} from '@fileshop/shared'
import { withDatabase, unixNow } from './database'
import { NotFoundError } from '../errors'
import { createLogger } from '../utils/logger'

const log = createLogger('ledger')

interface UserRow {
  id: number
  telegram_id: number
  username: string | null
  created_at: number
}

interface PurchaseRow {
  id: number
  user_id: number
  product_id: string
  plan: string
  provider: string
  provider_ref: string | null
  amount: number
  success: number
  created_at: number
}

interface PurchaseListingRow extends PurchaseRow {
  telegram_id: number | null
  username: string | null
}

const PURCHASE_COLUMNS =
  'p.id, p.user_id, p.product_id, p.plan, p.provider, p.provider_ref, p.amount, p.success, p.created_at'

function toUser(row: UserRow): ShopUser {
  return {
    id: row.id,
    telegramId: row.telegram_id,
    username: row.username ?? '',
    createdAt: row.created_at,
  }
}

function toPurchase(row: PurchaseRow): Purchase {
  const { plan, provider } = row
  if (!isPlanTier(plan) || !isPaymentProvider(provider)) {
    throw new Error(`Corrupt purchase row ${row.id}: plan=${plan} provider=${provider}`)
  }
  return {
    id: row.id,
    userId: row.user_id,
    productId: row.product_id,
    plan,
    provider,
    providerRef: row.provider_ref ?? '',
    amount: row.amount,
    success: row.success === 1,
    createdAt: row.created_at,
  }
}

/**
 * Persistent store of users and purchases. Every method opens its own
 * connection, so no transaction ever spans two chat turns.
 */
export class PurchaseLedger {
  constructor(
    private readonly databasePath: string,
    private readonly clock: () => number = unixNow
  ) {}

  private run<T>(fn: (db: Database.Database) => T): T {
    return withDatabase(this.databasePath, fn)
  }

  // Insert-or-ignore on telegram_id; the handle is kept from the first insert
  ensureUser(identity: CustomerIdentity): number {
    return this.run(db => {
      db.prepare<[number, string, number]>(
        'INSERT OR IGNORE INTO users (telegram_id, username, created_at) VALUES (?, ?, ?)'
      ).run(identity.telegramId, identity.username ?? '', this.clock())

      const row = db
        .prepare<[number], { id: number }>('SELECT id FROM users WHERE telegram_id = ?')
        .get(identity.telegramId)
      if (!row) {
        throw new Error(`User ${identity.telegramId} missing after upsert`)
      }
      return row.id
    })
  }

  getUserByTelegramId(telegramId: number): ShopUser | null {
    return this.run(db => {
      const row = db
        .prepare<[number], UserRow>(
          'SELECT id, telegram_id, username, created_at FROM users WHERE telegram_id = ?'
        )
        .get(telegramId)
      return row ? toUser(row) : null
    })
  }

  createPurchase(data: CreatePurchaseDTO): number {
    return this.run(db => {
      const result = db
        .prepare<[number, string, string, string, string, number, number]>(
          `INSERT INTO purchases
             (user_id, product_id, plan, provider, provider_ref, amount, success, created_at)
           VALUES (?, ?, ?, ?, ?, ?, 0, ?)`
        )
        .run(
          data.userId,
          data.productId,
          data.plan,
          data.provider,
          data.providerRef,
          data.amount,
          this.clock()
        )
      const purchaseId = Number(result.lastInsertRowid)

      log.info(
        {
          purchaseId,
          userId: data.userId,
          productId: data.productId,
          plan: data.plan,
          provider: data.provider,
          amount: data.amount,
        },
        'Purchase created'
      )
      return purchaseId
    })
  }

  getPurchase(id: number): Purchase {
    const row = this.run(db =>
      db
        .prepare<[number], PurchaseRow>(`SELECT ${PURCHASE_COLUMNS} FROM purchases p WHERE p.id = ?`)
        .get(id)
    )
    if (!row) {
      throw new NotFoundError('purchase', id)
    }
    return toPurchase(row)
  }

  /**
   * Newest purchase that is still pending. Scoped to one user when
   * `userId` is given, otherwise across every user.
   */
  latestPending(userId?: number): Purchase | null {
    const row = this.run(db => {
      if (userId === undefined) {
        return db
          .prepare<[], PurchaseRow>(
            `SELECT ${PURCHASE_COLUMNS} FROM purchases p
             WHERE p.success = 0
             ORDER BY p.created_at DESC, p.id DESC
             LIMIT 1`
          )
          .get()
      }
      return db
        .prepare<[number], PurchaseRow>(
          `SELECT ${PURCHASE_COLUMNS} FROM purchases p
           WHERE p.success = 0 AND p.user_id = ?
           ORDER BY p.created_at DESC, p.id DESC
           LIMIT 1`
        )
        .get(userId)
    })
    return row ? toPurchase(row) : null
  }

  /**
   * Flips a pending purchase to success and stores the proof as its
   * provider reference. Returns false when the purchase was already
   * successful or does not exist; nothing is written in that case.
   */
  markSuccess(id: number, proofReference: string): boolean {
    const changed = this.run(db =>
      db
        .prepare<[string, number]>(
          'UPDATE purchases SET success = 1, provider_ref = ? WHERE id = ? AND success = 0'
        )
        .run(proofReference, id).changes
    )

    if (changed > 0) {
      log.info({ purchaseId: id }, 'Purchase marked as paid')
    } else {
      log.debug({ purchaseId: id }, 'markSuccess skipped, purchase not pending')
    }
    return changed > 0
  }

  listAll(limit: number): PurchaseListing[] {
    const rows = this.run(db =>
      db
        .prepare<[number], PurchaseListingRow>(
          `SELECT ${PURCHASE_COLUMNS}, u.telegram_id, u.username
           FROM purchases p
           LEFT JOIN users u ON p.user_id = u.id
           ORDER BY p.created_at DESC, p.id DESC
           LIMIT ?`
        )
        .all(limit)
    )
    return rows.map(row => ({
      ...toPurchase(row),
      telegramId: row.telegram_id,
      username: row.username,
    }))
  }

  countPurchases(): { total: number; paid: number } {
    const row = this.run(db =>
      db
        .prepare<[], { total: number; paid: number | null }>(
          'SELECT COUNT(*) AS total, SUM(success) AS paid FROM purchases'
        )
        .get()
    )
    return { total: row?.total ?? 0, paid: row?.paid ?? 0 }
  }
}
