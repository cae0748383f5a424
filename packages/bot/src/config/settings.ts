// packages/bot/src/config/settings.ts - Shop settings document (config.json)
import { promises as fs, readFileSync, existsSync } from 'fs'
import path from 'path'
import { z } from 'zod'
import { PAYMENT_PROVIDERS, DEFAULT_PAYMENT_GATEWAY } from '@fileshop/shared'
import type { PaymentProvider } from '@fileshop/shared'

// Blank credentials in the document count as absent
const credential = z
  .string()
  .optional()
  .transform(v => (v && v.trim() ? v.trim() : undefined))

const settingsSchema = z
  .object({
    bot_token: z.string().optional(),
    admin_id: z.coerce.number().int().nonnegative().default(0),
    zarinpal_merchant_id: credential,
    idpay_api_key: credential,
    nextpay_api_key: credential,
    payment_gateway: z.enum(PAYMENT_PROVIDERS).default(DEFAULT_PAYMENT_GATEWAY),
  })
  .passthrough()

// The file as written, kept so a save does not rewrite what the admin typed
const documentSchema = z.record(z.unknown())

export type ShopSettings = z.infer<typeof settingsSchema>

export type SettingsPatch = Partial<Pick<ShopSettings, 'payment_gateway'>>

const CREDENTIAL_KEYS = {
  zarinpal: 'zarinpal_merchant_id',
  idpay: 'idpay_api_key',
  nextpay: 'nextpay_api_key',
} as const satisfies Record<PaymentProvider, keyof ShopSettings>

export function parseSettings(raw: unknown): ShopSettings {
  return settingsSchema.parse(raw)
}

/**
 * Process-wide owner of the settings document.
 *
 * Readers always see the last committed state through `current()`.
 * Writes go through `update()`, which queues them so only one persist
 * runs at a time.
 */
export class SettingsStore {
  private document: Record<string, unknown>
  private settings: ShopSettings
  private writeChain: Promise<void> = Promise.resolve()

  constructor(
    private readonly filePath: string | null,
    raw: unknown
  ) {
    this.settings = parseSettings(raw)
    this.document = documentSchema.parse(raw)
  }

  static load(filePath: string): SettingsStore {
    if (!existsSync(filePath)) {
      return new SettingsStore(filePath, {})
    }
    const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'))
    return new SettingsStore(filePath, raw)
  }

  // Settings that live only in memory, never written to disk
  static inMemory(raw: unknown = {}): SettingsStore {
    return new SettingsStore(null, raw)
  }

  current(): Readonly<ShopSettings> {
    return this.settings
  }

  credentialFor(provider: PaymentProvider): string | undefined {
    return this.settings[CREDENTIAL_KEYS[provider]]
  }

  hasAnyCredential(): boolean {
    return PAYMENT_PROVIDERS.some(provider => this.credentialFor(provider) !== undefined)
  }

  isAdmin(telegramId: number): boolean {
    return this.settings.admin_id !== 0 && this.settings.admin_id === telegramId
  }

  update(patch: SettingsPatch): Promise<ShopSettings> {
    const run = this.writeChain.then(async () => {
      const document = { ...this.document, ...patch }
      const next = parseSettings(document)
      await this.persist(document)
      this.document = document
      this.settings = next
      return next
    })
    this.writeChain = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }

  private async persist(document: Record<string, unknown>): Promise<void> {
    if (!this.filePath) return
    const tmp = path.join(path.dirname(this.filePath), `.${path.basename(this.filePath)}.tmp`)
    await fs.writeFile(tmp, JSON.stringify(document, null, 2) + '\n', 'utf-8')
    await fs.rename(tmp, this.filePath)
  }
}
