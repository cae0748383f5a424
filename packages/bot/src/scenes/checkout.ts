// packages/bot/src/scenes/checkout.ts - Plan and gateway selection
import { Composer } from 'grammy'
import { isPaymentProvider, isPlanTier } from '@fileshop/shared'
import type { BotContext } from '../types/context'
import { providerKeyboard } from '../keyboards/main'
import { formatAmount, formatProvider } from '../utils/formatter'
import { NotFoundError } from '../errors'

export const checkoutHandlers = new Composer<BotContext>()

// buy|<product>|<plan>
checkoutHandlers.callbackQuery(/^buy\|([^|]+)\|([^|]+)$/, async (ctx) => {
  await ctx.answerCallbackQuery()

  const key = ctx.match[1] ?? ''
  const tier = ctx.match[2] ?? ''
  if (!isPlanTier(tier)) {
    throw new NotFoundError('plan', tier)
  }

  const { product } = ctx.services.checkout.browse(key)
  const plan = product.plans[tier]
  const defaultProvider = ctx.services.settings.current().payment_gateway

  await ctx.reply(`میزان: ${formatAmount(plan.price)}\nدرگاه مدنظر را انتخاب کنید:`, {
    reply_markup: providerKeyboard(product.key, tier, defaultProvider),
  })
})

// startpay|<product>|<plan>|<provider>
checkoutHandlers.callbackQuery(/^startpay\|([^|]+)\|([^|]+)\|([^|]+)$/, async (ctx) => {
  await ctx.answerCallbackQuery()

  const provider = ctx.match[3] ?? ''
  if (!ctx.customer || !isPaymentProvider(provider)) {
    await ctx.reply('دادهٔ نامعتبر.')
    return
  }

  const started = ctx.services.checkout.beginCheckout(
    ctx.customer,
    ctx.match[1] ?? '',
    ctx.match[2] ?? '',
    provider
  )

  await ctx.reply(
    `درگاه: ${formatProvider(started.provider)}\n` +
    `مبلغ: ${formatAmount(started.amount)}\n\n` +
    `برای پرداخت به این لینک بروید:\n${started.url}\n\n` +
    'پس از پرداخت، شمارهٔ تراکنش یا کد تراکنش را اینجا ارسال کنید ' +
    `(مثلاً: <code>تراکنش ${started.purchaseId} 123456</code>).`,
    { parse_mode: 'HTML' }
  )
})
