// packages/bot/src/bot/error-handler.ts - Unhandled bot errors
import { GrammyError, HttpError } from 'grammy'
import type { Bot, BotError } from 'grammy'
import type { BotContext } from '../types/context'
import { logger } from '../utils/logger'

const GENERIC_FAILURE = '❌ خطایی رخ داد. لطفاً دوباره تلاش کنید یا با پشتیبانی تماس بگیرید.'

export function setupErrorHandler(bot: Bot<BotContext>): void {
  bot.catch(async (err: BotError<BotContext>) => {
    const ctx = err.ctx
    const error = err.error

    logger.error({
      update_id: ctx.update.update_id,
      from: ctx.from?.id,
      chat: ctx.chat?.id,
      err: error,
    }, 'Bot error')

    if (error instanceof GrammyError) {
      await handleGrammyError(ctx, error)
    } else if (error instanceof HttpError) {
      logger.error({ err: error.error }, 'HTTP error while calling Telegram')
    } else {
      await notifyUser(ctx, GENERIC_FAILURE)
    }
  })
}

async function handleGrammyError(ctx: BotContext, error: GrammyError): Promise<void> {
  logger.error({
    method: error.method,
    error_code: error.error_code,
    description: error.description,
  }, 'Telegram API error')

  if (error.error_code === 403) {
    // Bot blocked by the user
    logger.info(`Bot blocked by user ${ctx.from?.id}`)
    return
  }

  if (error.error_code === 429) {
    logger.warn('Rate limit hit')
    return
  }

  if (error.error_code === 400 && error.description.includes('message is not modified')) {
    return
  }

  await notifyUser(ctx, GENERIC_FAILURE)
}

async function notifyUser(ctx: BotContext, text: string): Promise<void> {
  if (!ctx.chat) return
  try {
    await ctx.reply(text)
  } catch (error) {
    logger.warn({ err: error, chat: ctx.chat.id }, 'Failed to notify user about an error')
  }
}
