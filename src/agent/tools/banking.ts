import { formatAmount, formatBool, normText } from '../../browser/normalize'
import type { ToolDefinition } from '../registry'
import { argString } from '../registry'
import { clickConcern, typeConcern } from './common'

function fillTool(name: string, field: 'Username' | 'Password', concern: string): ToolDefinition {
  const param = field.toLowerCase()
  return {
    name,
    description: `Fill the ${param} field on the login page.`,
    params: [{ name: param, type: 'string', description: `${field} for the account.`, maxLength: 1000 }],
    async run(ctx, args) {
      const outcome = await typeConcern(ctx, concern, argString(args, param))
      return outcome.kind === 'typed' ? `${field} filled.` : `${field} field not found.`
    },
  }
}

export const bankingTools: ToolDefinition[] = [
  {
    name: 'bank_go_home',
    description: 'Open the bank landing page.',
    params: [{ name: 'base_url', type: 'string', description: 'Base URL of the site; defaults to the profile URL.', optional: true }],
    async run(ctx, args) {
      const url = argString(args, 'base_url') || ctx.site.baseUrl
      const res = await ctx.executor.navigate(url)
      return res.ok ? `Opened: ${url}` : `Navigation failed: ${res.error}`
    },
  },
  {
    name: 'bank_header_sign_in',
    description: "Click the header 'Sign in / Log in' entry if present.",
    params: [],
    async run(ctx) {
      const outcome = await clickConcern(ctx, 'HEADER_LOGIN')
      return outcome.kind === 'clicked' ? 'Header login clicked.' : 'Header login not found.'
    },
  },
  {
    name: 'bank_is_login_context',
    description: 'Whether login UI is showing: login URL, username field or password field.',
    params: [],
    async run(ctx) {
      return `login_context=${formatBool(await ctx.detector.loginContext())}`
    },
  },
  fillTool('bank_fill_username', 'Username', 'LOGIN_USERNAME'),
  fillTool('bank_fill_password', 'Password', 'LOGIN_PASSWORD'),
  {
    name: 'bank_submit_login',
    description: 'Submit the login form: click submit, or press ENTER in the password field.',
    params: [],
    async run(ctx) {
      const submitted = await clickConcern(ctx, 'LOGIN_SUBMIT')
      if (submitted.kind === 'clicked') return 'Login submit clicked.'
      const focused = await clickConcern(ctx, 'LOGIN_PASSWORD', { retries: 0, scroll: false })
      if (focused.kind === 'clicked') {
        const pressed = await ctx.executor.press('ENTER')
        if (pressed.kind === 'key_pressed') return 'Login submitted via ENTER.'
      }
      return 'Login submit control not found.'
    },
  },
  {
    name: 'bank_is_dashboard',
    description: 'Whether the signed-in dashboard is showing.',
    params: [],
    async run(ctx) {
      return `dashboard=${formatBool(await ctx.detector.dashboard())}`
    },
  },
  {
    name: 'bank_get_balance',
    description: "Read the displayed balance, e.g. 'balance_text=$1,234.56; balance_value=1234.56'.",
    params: [],
    async run(ctx) {
      const fact = await ctx.detector.balance()
      if (!fact) return 'balance_not_found'
      const value = fact.value === null ? 'unknown' : formatAmount(fact.value)
      return `balance_text=${normText(fact.text)}; balance_value=${value}`
    },
  },
  {
    name: 'bank_nav_to_transfer',
    description: 'Click the navigation entry for the Transfer page and wait for it.',
    params: [],
    async run(ctx) {
      const outcome = await clickConcern(ctx, 'NAV_TRANSFER')
      if (outcome.kind !== 'clicked') return 'transfer_nav_not_found'
      if (!(await ctx.detector.waitFor('TRANSFER_MARKER', ctx.config.actionTimeoutMs))) {
        ctx.log.debug('transfer marker did not appear')
      }
      return 'transfer_nav_clicked'
    },
  },
  {
    name: 'bank_is_transfer_page',
    description: 'Whether the transfer page or form is showing.',
    params: [],
    async run(ctx) {
      return `transfer_page=${formatBool(await ctx.detector.transferPage())}`
    },
  },
]
