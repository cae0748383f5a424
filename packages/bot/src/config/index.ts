// packages/bot/src/config/index.ts - Application configuration
import { z } from 'zod'
import dotenv from 'dotenv'
import path from 'path'
import { RATE_LIMITS } from '@fileshop/shared'

dotenv.config()

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform(v => v === 'true' || v === '1')

const configSchema = z.object({
  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Bot
  BOT_TOKEN: z.string().min(1).optional(),
  BOT_WEBHOOK_DOMAIN: z.string().url().optional(),
  BOT_WEBHOOK_PATH: z.string().default('/webhook'),
  BOT_WEBHOOK_PORT: z.coerce.number().int().positive().default(8443),

  // Storage
  SHOP_CONFIG_PATH: z.string().default('config.json'),
  PRODUCTS_DIR: z.string().default('products'),
  DATABASE_PATH: z.string().default('database.db'),

  // Payment
  PENDING_LOOKUP_SCOPE: z.enum(['user', 'global']).default('user'),
  PAYMENT_VERIFY_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  // Admin
  ADMIN_PURCHASE_LIST_LIMIT: z.coerce.number().int().positive().default(50),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_PRETTY: flag.default('true'),

  // Rate Limits
  RATE_LIMIT_WINDOW: z.coerce.number().int().positive().default(RATE_LIMITS.bot.window),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(RATE_LIMITS.bot.maxRequests),
})

export type Config = z.infer<typeof configSchema>

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  return configSchema.parse(env)
}

function loadConfig(): Config {
  try {
    return parseConfig(process.env)
  } catch (error) {
    // The logger depends on this module, so report through the console
    if (error instanceof z.ZodError) {
      console.error('Configuration validation failed:')
      error.errors.forEach(err => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`)
      })
    } else {
      console.error('Failed to load configuration:', error)
    }
    process.exit(1)
  }
}

export const config = loadConfig()

export const botConfig = {
  token: config.BOT_TOKEN,
  webhook: {
    domain: config.BOT_WEBHOOK_DOMAIN,
    path: config.BOT_WEBHOOK_PATH,
    port: config.BOT_WEBHOOK_PORT,
  },
  rateLimit: {
    window: config.RATE_LIMIT_WINDOW,
    maxRequests: config.RATE_LIMIT_MAX_REQUESTS,
  },
} as const

export const storageConfig = {
  settingsPath: path.resolve(config.SHOP_CONFIG_PATH),
  productsDir: path.resolve(config.PRODUCTS_DIR),
  databasePath: path.resolve(config.DATABASE_PATH),
} as const

export const paymentConfig = {
  pendingLookup: config.PENDING_LOOKUP_SCOPE,
  verifyTimeoutMs: config.PAYMENT_VERIFY_TIMEOUT_MS,
} as const

export const adminConfig = {
  purchaseListLimit: config.ADMIN_PURCHASE_LIST_LIMIT,
} as const

export const logConfig = {
  level: config.LOG_LEVEL,
  pretty: config.LOG_PRETTY,
} as const

// Environment helpers
export const isDevelopment = config.NODE_ENV === 'development'
export const isProduction = config.NODE_ENV === 'production'
export const isTest = config.NODE_ENV === 'test'
