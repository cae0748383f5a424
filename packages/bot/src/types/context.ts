// packages/bot/src/types/context.ts - Extended context
import type { Context as BaseContext } from 'grammy'
import type { CustomerIdentity } from '@fileshop/shared'
import type { ShopServices } from '../services'

export type BotContext = BaseContext & {
  services: ShopServices
  // Set for every update that has a sender
  customer: CustomerIdentity | null
}
