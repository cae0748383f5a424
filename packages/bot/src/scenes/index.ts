// packages/bot/src/scenes/index.ts - Handler registration
import type { Bot } from 'grammy'
import type { BotContext } from '../types/context'
import { catalogHandlers } from './catalog'
import { checkoutHandlers } from './checkout'
import { adminHandlers } from './admin'
import { receiptHandlers } from './receipt'

export function setupScenes(bot: Bot<BotContext>): void {
  bot.use(catalogHandlers)
  bot.use(checkoutHandlers)
  bot.use(adminHandlers)

  // Free text goes last so commands win
  bot.use(receiptHandlers)

  // Unknown callback_query
  bot.on('callback_query:data', async (ctx) => {
    await ctx.answerCallbackQuery({
      text: 'دادهٔ نامعتبر.',
      show_alert: false,
    })
  })
}
