// packages/bot/src/scenes/receipt.ts - Payment proof submission
import { Composer } from 'grammy'
import type { BotContext } from '../types/context'

export const receiptHandlers = new Composer<BotContext>()

receiptHandlers.on('message:text', async (ctx, next) => {
  const text = ctx.message.text.trim()
  if (!text || text.startsWith('/') || !ctx.customer) {
    return next()
  }

  const result = await ctx.services.checkout.submitProof(ctx.customer, text)

  if (result.status === 'rejected') {
    await ctx.reply(
      'پرداخت تأیید نشد. اگر پرداخت موفق بوده، لطفاً رسید یا شمارهٔ تراکنش را ' +
      'ارسال کنید یا با پشتیبانی تماس بگیرید.'
    )
    return
  }

  await ctx.reply('پرداخت تایید شد. این هم لینک دانلود شما (مستقیم):\n' + result.downloadLink)
})
