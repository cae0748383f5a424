// packages/bot/src/bot/middleware.ts - Middleware setup
import type { Bot, NextFunction } from 'grammy'
import { PAYMENT_PROVIDERS } from '@fileshop/shared'
import type { BotContext } from '../types/context'
import type { ShopServices } from '../services'
import { InvalidInputError, NotFoundError, isShopError } from '../errors'
import type { ShopError } from '../errors'
import { logger } from '../utils/logger'

const NOT_FOUND_MESSAGES: Record<NotFoundError['resource'], string> = {
  product: 'محصول پیدا نشد.',
  plan: 'پلن انتخاب‌شده وجود ندارد.',
  purchase: 'خرید مورد نظر یافت نشد. شناسه خرید را بررسی کن.',
  pending_purchase: 'خرید در حال انتظار پیدا نشد. لطفا ابتدا یک محصول بخرید.',
}

const INVALID_INPUT_MESSAGES: Record<InvalidInputError['reason'], string> = {
  empty_receipt: 'لطفاً شمارهٔ تراکنش را ارسال کنید.',
  unknown_gateway: `درگاه نامعتبر. گزینه‌ها: ${PAYMENT_PROVIDERS.join(', ')}`,
}

export function shopErrorMessage(error: ShopError): string {
  if (error instanceof NotFoundError) return NOT_FOUND_MESSAGES[error.resource]
  if (error instanceof InvalidInputError) return INVALID_INPUT_MESSAGES[error.reason]
  return 'فقط ادمین مجاز است.'
}

export function setupMiddlewares(bot: Bot<BotContext>, services: ShopServices): void {
  // Logging middleware
  bot.use(async (ctx, next) => {
    const start = Date.now()

    try {
      await next()
    } finally {
      const ms = Date.now() - start
      logger.debug({
        update_id: ctx.update.update_id,
        from: ctx.from?.id,
        chat: ctx.chat?.id,
        text: ctx.message?.text,
        callback: ctx.callbackQuery?.data,
        duration_ms: ms,
      })
    }
  })

  // Services and caller identity
  bot.use(async (ctx, next) => {
    ctx.services = services
    ctx.customer = ctx.from
      ? { telegramId: ctx.from.id, username: ctx.from.username ?? '' }
      : null
    await next()
  })

  bot.use(replyOnShopError)
}

// NotFound, Unauthorized and InvalidInput end here as a denial message
export async function replyOnShopError(ctx: BotContext, next: NextFunction): Promise<void> {
  try {
    await next()
  } catch (error) {
    if (!isShopError(error)) {
      throw error
    }
    logger.info({ code: error.code, from: ctx.from?.id, reason: error.message }, 'Request denied')
    await ctx.reply(shopErrorMessage(error))
  }
}
