import { formatAmount } from '../../browser/normalize'
import { resolve } from '../../browser/resolver'
import { candidates } from '../../browser/selectors'
import { formatVerdict } from '../../policy/types'
import { CART_PATH } from '../../sites/shopping'
import type { ToolContext } from '../context'
import { STOPPED_ON_CHECKOUT, ToolDefinition, ToolParam, argNumber, argString } from '../registry'
import { clickConcern } from './common'

const MAX_PRICE: ToolParam = {
  name: 'max_price',
  type: 'number',
  description: 'Price ceiling in USD; defaults to the configured ceiling.',
  optional: true,
  min: 0,
}

async function closeBanners(ctx: ToolContext): Promise<void> {
  await clickConcern(ctx, 'COOKIE_ACCEPT', { retries: 0 })
  await clickConcern(ctx, 'POPOVER_CLOSE', { retries: 0 })
}

function resultsReady(ctx: ToolContext): Promise<boolean> {
  return ctx.detector.waitFor('RESULTS_READY', ctx.config.actionTimeoutMs)
}

/** Server-side price cap in cents on the results URL. */
export function withPriceCap(url: string, maxPrice: number): string {
  const parsed = new URL(url)
  parsed.searchParams.set('rh', `p_36:-${Math.round(maxPrice * 100)}`)
  return parsed.toString()
}

function searchUrl(base: string, query: string): string {
  const q = encodeURIComponent(query.trim()).replace(/%20/g, '+')
  return `${base.replace(/\/+$/, '')}/s?k=${q}`
}

async function readPrice(ctx: ToolContext): Promise<number | null> {
  const fact = await ctx.detector.amount('PRODUCT_PRICE')
  return fact?.value ?? null
}

export const shoppingTools: ToolDefinition[] = [
  {
    name: 'shop_open_results',
    description: 'Open search results for a query, optionally capped by a maximum price and sorted low to high.',
    params: [{ name: 'query', type: 'string', description: 'Product query.', maxLength: 500 }, MAX_PRICE],
    async run(ctx, args) {
      const query = argString(args, 'query')
      const maxPrice = argNumber(args, 'max_price')
      const opened = await ctx.executor.navigate(searchUrl(ctx.site.baseUrl, query))
      if (!opened.ok) return `Navigation failed: ${opened.error}`
      await closeBanners(ctx)

      const checkpoint = await ctx.detector.checkpoint()
      if (checkpoint) return `blocked:${checkpoint}`
      await resultsReady(ctx)

      if (maxPrice !== undefined) {
        const capped = await ctx.executor.navigate(withPriceCap(ctx.detector.url(), maxPrice))
        if (capped.ok) await resultsReady(ctx)
        const sort = await clickConcern(ctx, 'SORT_DROPDOWN', { retries: 0 })
        if (sort.kind === 'clicked') {
          await clickConcern(ctx, 'SORT_PRICE_ASC', { retries: 0, timeoutMs: 300 })
          await resultsReady(ctx)
        }
      }
      return `results_opened:${query}:cap=${maxPrice === undefined ? 'none' : formatAmount(maxPrice)}`
    },
  },
  {
    name: 'shop_next_results_page',
    description: 'Advance to the next results page if there is one.',
    params: [],
    async run(ctx) {
      const next = await resolve(ctx.session.driver, candidates(ctx.site.selectors, 'NEXT_PAGE'))
      if (!next) return 'NO_NEXT'
      const cls = (await next.element.attribute('class')) ?? ''
      if (cls.includes('disabled')) return 'NO_NEXT'
      const outcome = await clickConcern(ctx, 'NEXT_PAGE')
      if (outcome.kind !== 'clicked') return 'NO_NEXT'
      return (await resultsReady(ctx)) ? 'NEXT_OK' : 'NO_NEXT'
    },
  },
  {
    name: 'shop_open_product',
    description: 'Open the first product on the results page.',
    params: [],
    async run(ctx) {
      const outcome = await clickConcern(ctx, 'RESULT_LINK', { timeoutMs: ctx.config.actionTimeoutMs })
      return outcome.kind === 'clicked' ? 'product_opened' : 'product_not_found'
    },
  },
  {
    name: 'shop_product_price',
    description: 'Read the product price and check it against the price ceiling.',
    params: [MAX_PRICE],
    async run(ctx, args) {
      const price = await readPrice(ctx)
      const verdict = ctx.guard.checkPrice(price, argNumber(args, 'max_price') ?? ctx.guard.maxPrice)
      return `price=${price === null ? 'unknown' : formatAmount(price)}; verdict=${formatVerdict(verdict)}`
    },
  },
  {
    name: 'shop_add_to_cart',
    description: 'Add the open product to the cart if its price passes the ceiling.',
    params: [MAX_PRICE],
    async run(ctx, args) {
      const verdict = ctx.guard.checkPrice(await readPrice(ctx), argNumber(args, 'max_price') ?? ctx.guard.maxPrice)
      if (!verdict.allowed) return `BLOCKED(${verdict.reason})`

      const outcome = await clickConcern(ctx, 'ADD_TO_CART', {
        timeoutMs: ctx.config.actionTimeoutMs,
        retries: 1,
        settleMs: 2000,
      })
      if (outcome.kind !== 'clicked') return 'ADD_FAILED_NEEDS_HUMAN'
      const declined = await clickConcern(ctx, 'WARRANTY_DECLINE', { retries: 0 })
      if (declined.kind !== 'clicked') await clickConcern(ctx, 'SIDESHEET_CLOSE', { retries: 0 })
      return 'ADDED'
    },
  },
  {
    name: 'shop_proceed_to_checkout',
    description: 'Go from the cart overlay or cart page into the checkout flow.',
    params: [],
    async run(ctx) {
      await clickConcern(ctx, 'PROCEED_TO_CHECKOUT', { timeoutMs: ctx.config.actionTimeoutMs, settleMs: 2000 })
      if (!ctx.detector.url().includes('checkout')) {
        const cart = await ctx.executor.navigate(`${ctx.site.baseUrl.replace(/\/+$/, '')}${CART_PATH}`)
        if (cart.ok) {
          await clickConcern(ctx, 'PROCEED_TO_CHECKOUT', { timeoutMs: ctx.config.actionTimeoutMs, settleMs: 2000 })
        }
      }
      const checkpoint = await ctx.detector.checkpoint()
      if (checkpoint) return `HUMAN_NEEDED_${checkpoint.toUpperCase()}`
      return 'CHECKOUT_FLOW'
    },
  },
  {
    name: 'shop_stop_if_checkout',
    description: 'End the session if the irreversible checkout page has been reached.',
    params: [],
    async run(ctx) {
      return (await ctx.guard.enforceBoundary(ctx.session)) === 'stopped' ? STOPPED_ON_CHECKOUT : 'NOT_AT_CHECKOUT_SPC'
    },
  },
]
