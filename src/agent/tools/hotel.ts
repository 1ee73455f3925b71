import { formatBool } from '../../browser/normalize'
import { resolve } from '../../browser/resolver'
import { candidates, xpathLiteral } from '../../browser/selectors'
import { sleep } from '../../util/time'
import type { ToolContext } from '../context'
import { ToolDefinition, argNumber, argString } from '../registry'
import { clickConcern, dismissOverlays, typeConcern } from './common'

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/

async function destinationValue(ctx: ToolContext): Promise<string> {
  const input = await resolve(ctx.session.driver, candidates(ctx.site.selectors, 'DEST_INPUT'))
  if (!input) return ''
  try {
    return await input.element.value()
  } catch (err) {
    ctx.log.debug({ err }, 'destination value unreadable')
    return ''
  }
}

async function pickFirstSuggestion(ctx: ToolContext): Promise<void> {
  await ctx.executor.press('ARROW_DOWN')
  await ctx.executor.press('ENTER')
}

export const hotelTools: ToolDefinition[] = [
  {
    name: 'hotel_home',
    description: 'Open the booking home page with a language and currency.',
    params: [
      { name: 'lang', type: 'string', description: "Locale code, e.g. 'en-us'.", default: 'en-us', maxLength: 16 },
      { name: 'currency', type: 'string', description: "Currency code, e.g. 'USD'.", default: 'USD', maxLength: 8 },
    ],
    async run(ctx, args) {
      const url = new URL(ctx.site.baseUrl)
      url.searchParams.set('lang', argString(args, 'lang'))
      url.searchParams.set('selected_currency', argString(args, 'currency'))
      const res = await ctx.executor.navigate(url.toString())
      return res.ok ? `Navigated to: ${url.toString()}` : `Navigation failed: ${res.error}`
    },
  },
  {
    name: 'hotel_accept_cookies',
    description: 'Accept the cookie banner if present.',
    params: [],
    async run(ctx) {
      const outcome = await clickConcern(ctx, 'COOKIE_ACCEPT')
      return outcome.kind === 'clicked' ? 'Cookie accept clicked.' : 'Cookie banner not found.'
    },
  },
  {
    name: 'hotel_set_destination',
    description: 'Type a destination and pick the matching (or first) autocomplete option.',
    params: [{ name: 'city', type: 'string', description: "City or area, e.g. 'Seoul'.", maxLength: 200 }],
    async run(ctx, args) {
      const city = argString(args, 'city')
      await dismissOverlays(ctx)
      const focused = await clickConcern(ctx, 'DEST_INPUT')
      if (focused.kind !== 'clicked') return 'Destination input not found.'
      const typed = await typeConcern(ctx, 'DEST_INPUT', city)
      if (typed.kind !== 'typed') return 'Typing failed.'
      await sleep(600)

      const option = await clickConcern(ctx, 'DEST_OPTION', { params: { city: xpathLiteral(city) } })
      if (option.kind !== 'clicked') await pickFirstSuggestion(ctx)
      await sleep(500)

      let value = await destinationValue(ctx)
      if (!value.toLowerCase().includes(city.toLowerCase())) {
        await typeConcern(ctx, 'DEST_INPUT', city)
        await sleep(500)
        await pickFirstSuggestion(ctx)
        await sleep(500)
        value = await destinationValue(ctx)
      }
      return `Destination set: ${value || city}`
    },
  },
  {
    name: 'hotel_set_dates',
    description: 'Open the calendar and pick check-in and check-out dates (YYYY-MM-DD).',
    params: [
      { name: 'checkin', type: 'string', description: 'Check-in date, YYYY-MM-DD.', maxLength: 10 },
      { name: 'checkout', type: 'string', description: 'Check-out date, YYYY-MM-DD.', maxLength: 10 },
    ],
    async run(ctx, args) {
      const checkin = argString(args, 'checkin')
      const checkout = argString(args, 'checkout')
      if (!ISO_DATE.test(checkin) || !ISO_DATE.test(checkout)) return 'invalid_args:checkin/checkout must be YYYY-MM-DD'
      await dismissOverlays(ctx)
      await clickConcern(ctx, 'DATE_FIELD_START', { retries: 0 })
      const okIn = await clickConcern(ctx, 'DATE_CELL', { params: { date: checkin } })
      const okOut = await clickConcern(ctx, 'DATE_CELL', { params: { date: checkout } })
      return `Dates set: ${checkin} → ${checkout} (${formatBool(okIn.kind === 'clicked')},${formatBool(okOut.kind === 'clicked')})`
    },
  },
  {
    name: 'hotel_set_guests',
    description: 'Open the guests widget and set the number of adults and rooms.',
    params: [
      { name: 'adults', type: 'integer', description: 'Adults (>= 1).', default: 1, min: 1, max: 30 },
      { name: 'rooms', type: 'integer', description: 'Rooms (>= 1).', default: 1, min: 1, max: 30 },
    ],
    async run(ctx, args) {
      const adults = argNumber(args, 'adults') ?? 1
      const rooms = argNumber(args, 'rooms') ?? 1
      await dismissOverlays(ctx)
      await clickConcern(ctx, 'GUEST_TOGGLE')
      await sleep(200)
      // widget floor is one adult
      for (let i = 0; i < 5; i++) await clickConcern(ctx, 'ADULTS_MINUS', { scroll: false, retries: 0 })
      for (let i = 1; i < adults; i++) await clickConcern(ctx, 'ADULTS_PLUS', { scroll: false, retries: 0 })
      for (let i = 1; i < rooms; i++) await clickConcern(ctx, 'ROOMS_PLUS', { scroll: false, retries: 0 })
      return `Guests set: adults=${adults}, rooms=${rooms}`
    },
  },
  {
    name: 'hotel_submit_search',
    description: 'Click the search button on the search form.',
    params: [],
    async run(ctx) {
      const outcome = await clickConcern(ctx, 'SEARCH_SUBMIT', { settleMs: 1000 })
      return outcome.kind === 'clicked' ? 'Search submitted.' : 'Search button not found.'
    },
  },
  {
    name: 'hotel_apply_star_filter',
    description: 'Apply a minimum star rating filter.',
    params: [{ name: 'min_stars', type: 'integer', description: 'Minimum stars (1-5).', default: 4, min: 1, max: 5 }],
    async run(ctx, args) {
      const stars = argNumber(args, 'min_stars') ?? 4
      await dismissOverlays(ctx)
      const outcome = await clickConcern(ctx, 'FILTER_STARS', { params: { stars }, settleMs: 400 })
      return outcome.kind === 'clicked' ? `Star filter applied: >= ${stars}` : 'Star filter not found'
    },
  },
  {
    name: 'hotel_open_first_result',
    description: 'Open the first property in the results.',
    params: [],
    async run(ctx) {
      await dismissOverlays(ctx)
      const outcome = await clickConcern(ctx, 'FIRST_RESULT_LINK')
      return outcome.kind === 'clicked' ? 'Opened first result.' : 'No result link found.'
    },
  },
  {
    name: 'hotel_click_reserve_cta',
    description: 'Click a Reserve / Book now / Continue button.',
    params: [],
    async run(ctx) {
      const outcome = await clickConcern(ctx, 'RESERVE_CTA', { settleMs: 1500 })
      return outcome.kind === 'clicked' ? 'Clicked Reserve/Book/Continue CTA.' : 'Reserve/Continue CTA not found.'
    },
  },
  {
    name: 'hotel_pay_with_stored_token',
    description: "Authorize a charge with the user's stored payment token, subject to the price ceiling.",
    params: [
      { name: 'user_id', type: 'string', description: 'Account whose stored token is used.', maxLength: 200 },
      { name: 'amount', type: 'number', description: 'Charge in USD.', min: 0 },
    ],
    async run(ctx, args) {
      const userId = argString(args, 'user_id')
      const amount = argNumber(args, 'amount') ?? Number.NaN
      const token = await ctx.records.fetchStoredPaymentToken(userId)
      if (!token) return 'NO_STORED_PAYMENT'

      const steps = [`Agent: Request payment authorization of $${amount} via token.`]
      const verdict = ctx.guard.checkPrice(amount)
      if (!verdict.allowed) {
        steps.push(`Stop guard: ${verdict.reason}`)
        await ctx.records.recordWorkflow(userId, { name: 'BookHotel', steps, status: 'failed' })
        return `PAYMENT_BLOCKED(${verdict.reason})`
      }

      const auth = await ctx.records.authorize(token, amount)
      steps.push(`Payment Gateway: ${auth.message}`)
      await ctx.records.recordWorkflow(userId, { name: 'BookHotel', steps, status: auth.approved ? 'success' : 'failed' })
      return auth.approved ? `PAYMENT_APPROVED: ${auth.message}` : `PAYMENT_DENIED: ${auth.message}`
    },
  },
]
