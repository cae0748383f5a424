// packages/bot/src/scenes/admin.ts - Admin commands
import { Composer } from 'grammy'
import { PAYMENT_PROVIDERS } from '@fileshop/shared'
import type { BotContext } from '../types/context'
import { formatAmount, formatTimestamp } from '../utils/formatter'

export const adminHandlers = new Composer<BotContext>()

// /listpurchases
adminHandlers.command('listpurchases', async (ctx) => {
  const callerId = ctx.from?.id ?? 0
  const report = ctx.services.admin.listPurchases(callerId, ctx.services.purchaseListLimit)

  if (report.purchases.length === 0) {
    await ctx.reply('خریدی ثبت نشده.')
    return
  }

  const lines = report.purchases.map(p =>
    `#${p.id} user:${p.telegramId ?? '-'} product:${p.productId} plan:${p.plan} ` +
    `amount:${formatAmount(p.amount)} success:${p.success ? 1 : 0} ref:${p.providerRef} ` +
    `time:${formatTimestamp(p.createdAt)}`
  )

  await ctx.reply(
    `خریدها (${report.paid}/${report.total} پرداخت‌شده):\n` + lines.join('\n')
  )
})

// /setgateway <zarinpal|idpay|nextpay>
adminHandlers.command('setgateway', async (ctx) => {
  const callerId = ctx.from?.id ?? 0
  ctx.services.admin.assertAdmin(callerId)

  const args = ctx.match.trim().split(/\s+/).filter(Boolean)
  if (args.length !== 1) {
    await ctx.reply(`فرمت: /setgateway <${PAYMENT_PROVIDERS.join('|')}>`)
    return
  }

  const gateway = await ctx.services.admin.setDefaultGateway(callerId, args[0] ?? '')
  await ctx.reply(`درگاه پیش‌فرض به ${gateway} تغییر یافت.`)
})
