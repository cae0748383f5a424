// packages/bot/src/bot/index.ts - Bot initialization
import { Bot, webhookCallback } from 'grammy'
import { autoRetry } from '@grammyjs/auto-retry'
import { limit } from '@grammyjs/ratelimiter'
import { run, sequentialize } from '@grammyjs/runner'
import type { RunnerHandle } from '@grammyjs/runner'
import express from 'express'
import type { Server } from 'http'
import type { BotContext } from '../types/context'
import type { ShopServices } from '../services'
import { botConfig, isDevelopment } from '../config'
import { logger } from '../utils/logger'
import { setupMiddlewares } from './middleware'
import { setupCommands } from './commands'
import { setupScenes } from '../scenes'
import { setupErrorHandler } from './error-handler'

export interface CreateBotOptions {
  token: string
  rateLimit?: { window: number; maxRequests: number }
}

export function createBot(services: ShopServices, options: CreateBotOptions): Bot<BotContext> {
  const bot = new Bot<BotContext>(options.token)
  const rateLimit = options.rateLimit ?? botConfig.rateLimit

  // API transformations
  bot.api.config.use(autoRetry())

  // Rate limiting
  bot.use(
    limit({
      timeFrame: rateLimit.window,
      limit: rateLimit.maxRequests,
      onLimitExceeded: async (ctx) => {
        await ctx.reply('⚠️ درخواست‌ها زیاد است. کمی صبر کنید.')
      },
    })
  )

  // One update at a time per user
  bot.use(sequentialize((ctx) => ctx.from?.id.toString()))

  setupMiddlewares(bot, services)
  setupCommands(bot)
  setupScenes(bot)
  setupErrorHandler(bot)

  return bot
}

export interface RunningBot {
  stop(): Promise<void>
}

export async function startBot(services: ShopServices, token: string): Promise<RunningBot> {
  const bot = createBot(services, { token })

  await bot.api.setMyCommands([
    { command: 'start', description: 'شروع' },
    { command: 'products', description: 'محصولات' },
    { command: 'help', description: 'راهنما' },
  ])

  const adminId = services.settings.current().admin_id
  if (adminId !== 0) {
    try {
      await bot.api.setMyCommands(
        [
          { command: 'products', description: 'محصولات' },
          { command: 'listpurchases', description: 'فهرست خریدها' },
          { command: 'setgateway', description: 'تغییر درگاه پیش‌فرض' },
        ],
        { scope: { type: 'chat', chat_id: adminId } }
      )
    } catch (error) {
      logger.warn({ err: error, adminId }, 'Failed to set admin commands')
    }
  }

  if (!isDevelopment && botConfig.webhook.domain) {
    return startWebhook(bot, botConfig.webhook.domain)
  }

  logger.info('🚀 Bot started in long polling mode')
  const runner: RunnerHandle = run(bot, {
    runner: {
      fetch: {
        allowed_updates: ['message', 'callback_query'],
      },
    },
  })
  return { stop: () => runner.stop() }
}

async function startWebhook(bot: Bot<BotContext>, domain: string): Promise<RunningBot> {
  const app = express()
  app.use(express.json())

  app.post(botConfig.webhook.path, webhookCallback(bot, 'express'))

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' })
  })

  const server: Server = app.listen(botConfig.webhook.port, () => {
    logger.info(`🚀 Bot webhook server running on port ${botConfig.webhook.port}`)
  })

  await bot.api.setWebhook(`${domain}${botConfig.webhook.path}`)
  logger.info('✅ Webhook set successfully')

  return {
    stop: () =>
      new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()))
      }),
  }
}
