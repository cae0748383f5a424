// packages/bot/src/bot/commands.ts - Command handlers
import type { Bot } from 'grammy'
import type { BotContext } from '../types/context'
import { escapeHtml } from '../utils/formatter'

export const HELP_TEXT =
  '❓ <b>راهنما</b>\n\n' +
  '/products - فهرست محصولات\n' +
  '/product_&lt;شناسه&gt; - مشاهدهٔ یک محصول\n\n' +
  '<b>مراحل خرید:</b>\n' +
  '1. محصول و نسخهٔ مورد نظر را انتخاب کنید\n' +
  '2. درگاه پرداخت را انتخاب کنید و پرداخت را انجام دهید\n' +
  '3. شمارهٔ تراکنش را ارسال کنید، مثلاً: <code>تراکنش 12 123456</code>'

export function setupCommands(bot: Bot<BotContext>): void {
  // /start
  bot.command('start', async (ctx) => {
    if (ctx.customer) {
      ctx.services.ledger.ensureUser(ctx.customer)
    }
    await ctx.reply('سلام! به فروشگاه فایل خوش آمدی. برای دیدن محصولات /products را بزن.')
  })

  // /products
  bot.command('products', async (ctx) => {
    const items = ctx.services.catalog.list()

    if (items.length === 0) {
      await ctx.reply('فعلاً محصولی وجود ندارد.')
      return
    }

    const lines = items.map(item => `${item.key}. ${escapeHtml(item.title)} — /product_${item.key}`)
    await ctx.reply('محصولات موجود:\n' + lines.join('\n'), { parse_mode: 'HTML' })
  })

  // /help
  bot.command('help', async (ctx) => {
    await ctx.reply(HELP_TEXT, { parse_mode: 'HTML' })
  })
}
