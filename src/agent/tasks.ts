import { bankingSite } from '../sites/banking'
import { hotelSite } from '../sites/hotel'
import { shoppingSite } from '../sites/shopping'
import type { SiteProfile } from '../sites/types'
import type { AgentStep } from './loop'
import type { ScriptedCall } from './planner'
import type { ToolDefinition } from './registry'
import { STOPPED_ON_CHECKOUT } from './registry'
import { bankingTools } from './tools/banking'
import { commonTools } from './tools/common'
import { hotelTools } from './tools/hotel'
import { shoppingTools } from './tools/shopping'

export type TaskName = 'banking' | 'shopping' | 'hotel'

export const TASK_NAMES: readonly TaskName[] = ['banking', 'shopping', 'hotel']

/** Inputs for a task's default script. Credentials are supplied by the caller. */
export interface TaskInput {
  baseUrl?: string
  username?: string
  password?: string
  query?: string
  maxPrice?: number
  city?: string
  checkin?: string
  checkout?: string
  adults?: number
  rooms?: number
  minStars?: number
  userId?: string
  amount?: number
}

export interface TaskDefinition {
  name: TaskName
  site: SiteProfile
  tools: ToolDefinition[]
  isSuccess(history: readonly AgentStep[]): boolean
  script(input: TaskInput): ScriptedCall[]
}

function lastResult(history: readonly AgentStep[]): string {
  return history.length > 0 ? history[history.length - 1].result : ''
}

export const TASKS: Readonly<Record<TaskName, TaskDefinition>> = {
  banking: {
    name: 'banking',
    site: bankingSite,
    tools: [...commonTools, ...bankingTools],
    isSuccess: (h) => lastResult(h) === 'transfer_page=True',
    script: (input) => [
      { tool: 'bank_go_home', args: input.baseUrl ? { base_url: input.baseUrl } : {} },
      { tool: 'close_popups' },
      { tool: 'bank_header_sign_in' },
      { tool: 'bank_is_login_context' },
      { tool: 'bank_fill_username', args: { username: input.username ?? '' } },
      { tool: 'bank_fill_password', args: { password: input.password ?? '' } },
      { tool: 'bank_submit_login' },
      { tool: 'bank_is_dashboard' },
      { tool: 'bank_get_balance' },
      { tool: 'bank_nav_to_transfer' },
      { tool: 'bank_is_transfer_page' },
    ],
  },
  shopping: {
    name: 'shopping',
    site: shoppingSite,
    tools: [...commonTools, ...shoppingTools],
    isSuccess: (h) => lastResult(h) === STOPPED_ON_CHECKOUT,
    script: (input) => {
      const cap = input.maxPrice === undefined ? {} : { max_price: input.maxPrice }
      return [
        { tool: 'shop_open_results', args: { query: input.query ?? '', ...cap } },
        { tool: 'shop_open_product' },
        { tool: 'shop_product_price', args: cap },
        { tool: 'shop_add_to_cart', args: cap },
        { tool: 'shop_proceed_to_checkout' },
        { tool: 'shop_stop_if_checkout' },
      ]
    },
  },
  hotel: {
    name: 'hotel',
    site: hotelSite,
    tools: [...commonTools, ...hotelTools],
    isSuccess: (h) => lastResult(h).startsWith('PAYMENT_APPROVED'),
    script: (input) => [
      { tool: 'hotel_home' },
      { tool: 'hotel_accept_cookies' },
      { tool: 'hotel_set_destination', args: { city: input.city ?? '' } },
      { tool: 'hotel_set_dates', args: { checkin: input.checkin ?? '', checkout: input.checkout ?? '' } },
      { tool: 'hotel_set_guests', args: { adults: input.adults ?? 1, rooms: input.rooms ?? 1 } },
      { tool: 'hotel_submit_search' },
      { tool: 'hotel_apply_star_filter', args: { min_stars: input.minStars ?? 4 } },
      { tool: 'hotel_open_first_result' },
      { tool: 'hotel_click_reserve_cta' },
      { tool: 'hotel_pay_with_stored_token', args: { user_id: input.userId ?? '', amount: input.amount ?? 0 } },
    ],
  },
}

export function isTaskName(name: string): name is TaskName {
  return TASK_NAMES.some((t) => t === name)
}
