// packages/bot/src/services/catalog.ts - Product catalog on disk
import { existsSync, readdirSync, readFileSync, statSync } from 'fs'
import path from 'path'
import { z } from 'zod'
import { isSafeKey } from '@fileshop/shared'
import type { Plan, Product, ProductSummary } from '@fileshop/shared'
import { NotFoundError } from '../errors'
import { createLogger } from '../utils/logger'

const log = createLogger('catalog')

export const PRODUCT_FILE = 'product.json'

const planSchema = z
  .object({
    name: z.string().min(1),
    price: z.number().int().positive(),
    download_link: z.string().min(1),
  })
  .transform((plan): Plan => ({
    name: plan.name,
    price: plan.price,
    downloadLink: plan.download_link,
  }))

const productFileSchema = z.object({
  title: z.string().min(1),
  description: z.string().default(''),
  cover_image: z.string().default(''),
  plans: z.object({
    economic: planSchema,
    golden: planSchema,
  }),
})

/**
 * Read-only index over `<productsDir>/<key>/product.json`. Nothing is
 * cached: every call reads the files again.
 */
export class ProductCatalog {
  constructor(private readonly productsDir: string) {}

  list(): ProductSummary[] {
    if (!existsSync(this.productsDir)) {
      log.warn({ productsDir: this.productsDir }, 'Products directory does not exist')
      return []
    }

    const items: ProductSummary[] = []
    for (const key of readdirSync(this.productsDir).sort()) {
      if (!isSafeKey(key)) continue
      try {
        if (!statSync(path.join(this.productsDir, key)).isDirectory()) continue
        const product = this.load(key)
        items.push({ key, title: product.title })
      } catch (error) {
        log.warn({ key, err: error }, 'Skipping unreadable product')
      }
    }
    return items
  }

  load(key: string): Product {
    if (!isSafeKey(key)) {
      throw new NotFoundError('product', key)
    }

    const file = path.join(this.productsDir, key, PRODUCT_FILE)
    let raw: unknown
    try {
      raw = JSON.parse(readFileSync(file, 'utf-8'))
    } catch (error) {
      log.debug({ key, err: error }, 'Product definition unreadable')
      throw new NotFoundError('product', key)
    }

    const parsed = productFileSchema.safeParse(raw)
    if (!parsed.success) {
      log.debug({ key, issues: parsed.error.issues }, 'Product definition malformed')
      throw new NotFoundError('product', key)
    }

    return {
      key,
      title: parsed.data.title,
      description: parsed.data.description,
      coverImage: parsed.data.cover_image,
      plans: parsed.data.plans,
    }
  }

  // Absolute cover image path when the file exists inside the product directory
  coverPath(product: Product): string | null {
    if (!product.coverImage) return null
    const dir = path.resolve(this.productsDir, product.key)
    const file = path.resolve(dir, product.coverImage)
    if (path.dirname(file) !== dir || !existsSync(file)) {
      return null
    }
    return file
  }
}
