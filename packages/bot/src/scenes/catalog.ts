// packages/bot/src/scenes/catalog.ts - Product view
import { Composer, InputFile } from 'grammy'
import { PLAN_ICONS } from '@fileshop/shared'
import type { BotContext } from '../types/context'
import { planKeyboard } from '../keyboards/main'
import { escapeHtml, formatAmount } from '../utils/formatter'

export const catalogHandlers = new Composer<BotContext>()

// /product_<key>
catalogHandlers.hears(/^\/product_([A-Za-z0-9_-]+)(?:@\w+)?$/, async (ctx) => {
  const key = ctx.match[1] ?? ''
  const { product, offers } = ctx.services.checkout.browse(key)

  const caption =
    `<b>${escapeHtml(product.title)}</b>\n\n` +
    `${escapeHtml(product.description)}\n\n` +
    offers
      .map(offer => `${PLAN_ICONS[offer.tier]} ${escapeHtml(offer.name)}: ${formatAmount(offer.price)}`)
      .join('\n')

  const keyboard = planKeyboard(product.key, offers)
  const cover = ctx.services.catalog.coverPath(product)

  if (cover) {
    await ctx.replyWithPhoto(new InputFile(cover), {
      caption,
      parse_mode: 'HTML',
      reply_markup: keyboard,
    })
  } else {
    await ctx.reply(caption, { parse_mode: 'HTML', reply_markup: keyboard })
  }
})
