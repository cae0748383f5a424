// packages/bot/src/index.ts - Entry point
import { startBot } from './bot'
import type { RunningBot } from './bot'
import { storageConfig, paymentConfig, adminConfig, botConfig } from './config'
import { SettingsStore } from './config/settings'
import { initializeDatabase, checkDatabaseConnection } from './services/database'
import { createShopServices } from './services'
import { logger } from './utils/logger'

let running: RunningBot | null = null

async function main(): Promise<void> {
  try {
    logger.info('Starting application...')

    const settings = SettingsStore.load(storageConfig.settingsPath)
    const token = botConfig.token ?? settings.current().bot_token
    if (!token) {
      throw new Error(`Bot token not set. Put it in ${storageConfig.settingsPath} as "bot_token" or set BOT_TOKEN`)
    }

    initializeDatabase(storageConfig.databasePath)
    if (!checkDatabaseConnection(storageConfig.databasePath)) {
      throw new Error(`Database at ${storageConfig.databasePath} is not usable`)
    }

    const services = createShopServices({
      settings,
      productsDir: storageConfig.productsDir,
      databasePath: storageConfig.databasePath,
      pendingLookup: paymentConfig.pendingLookup,
      verifyTimeoutMs: paymentConfig.verifyTimeoutMs,
      purchaseListLimit: adminConfig.purchaseListLimit,
    })

    if (!settings.hasAnyCredential()) {
      logger.warn('No payment gateway credentials configured, receipts will be accepted without verification')
    }

    running = await startBot(services, token)
    logger.info('✅ Bot started successfully')
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start application')
    process.exit(1)
  }
}

async function shutdown(signal: string): Promise<void> {
  logger.info(`Shutting down gracefully (${signal})...`)

  try {
    await running?.stop()
    logger.info('✅ Shutdown complete')
  } catch (error) {
    logger.error({ err: error }, 'Error during shutdown')
  } finally {
    process.exit(0)
  }
}

process.once('SIGINT', () => void shutdown('SIGINT'))
process.once('SIGTERM', () => void shutdown('SIGTERM'))

process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled Rejection')
})

process.on('uncaughtException', (error) => {
  logger.fatal({ err: error }, 'Uncaught Exception')
  process.exit(1)
})

void main()
