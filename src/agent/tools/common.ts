import type { ActionOptions, ActionOutcome } from '../../browser/actions'
import { truncate } from '../../browser/normalize'
import { resolveAll } from '../../browser/resolver'
import { candidates, xpath, xpathLiteral } from '../../browser/selectors'
import { sleep } from '../../util/time'
import type { ToolContext } from '../context'
import { ToolDefinition, argNumber, argString } from '../registry'

export const DEFAULT_GATE_MESSAGE =
  'Complete any required human step (e.g., CAPTCHA/2FA), then press ENTER in console.'

/** Click the first candidate of a site concern. */
export function clickConcern(ctx: ToolContext, concern: string, opts: ActionOptions = {}): Promise<ActionOutcome> {
  return ctx.executor.click(candidates(ctx.site.selectors, concern), { purpose: concern, ...opts })
}

export function typeConcern(
  ctx: ToolContext,
  concern: string,
  text: string,
  opts: ActionOptions = {},
): Promise<ActionOutcome> {
  return ctx.executor.type(candidates(ctx.site.selectors, concern), text, { purpose: concern, ...opts })
}

/** ESC a few times, then click through whichever consent/popover controls the site declares. */
export async function dismissOverlays(ctx: ToolContext): Promise<void> {
  for (let i = 0; i < 3; i++) {
    await ctx.executor.press('ESCAPE')
    await sleep(200)
  }
  for (const concern of ['COOKIE_ACCEPT', 'POPOVER_CLOSE']) {
    if (ctx.site.selectors[concern]) await clickConcern(ctx, concern, { retries: 0 })
  }
}

const CLICKABLE_BY_TEXT = [
  xpath('//button[contains(normalize-space(.), {text})]'),
  xpath('//a[contains(normalize-space(.), {text})]'),
  xpath("//*[@role='button' or @role='link'][contains(normalize-space(.), {text})]"),
  xpath("//input[@type='submit' or @type='button'][contains(@value, {text})]"),
  xpath('//label[contains(normalize-space(.), {text})]'),
  xpath('//body//*[text()[contains(., {text})]]'),
]

export const commonTools: ToolDefinition[] = [
  {
    name: 'go_to',
    description: 'Open an absolute URL in the current tab.',
    params: [{ name: 'url', type: 'string', description: 'Absolute URL to open.', maxLength: 4096 }],
    async run(ctx, args) {
      const url = argString(args, 'url')
      const res = await ctx.executor.navigate(url)
      return res.ok ? `Navigated to: ${url}` : `Navigation failed: ${res.error}`
    },
  },
  {
    name: 'go_back',
    description: 'Go back one page in history.',
    params: [],
    async run(ctx) {
      const res = await ctx.executor.back()
      return res.ok ? 'Went back' : `Back failed: ${res.error}`
    },
  },
  {
    name: 'close_popups',
    description: 'Press ESC a few times and accept the cookie banner if one is shown.',
    params: [],
    async run(ctx) {
      await dismissOverlays(ctx)
      return 'Popups/consent dismissed if present.'
    },
  },
  {
    name: 'current_url',
    description: 'Return the current page URL.',
    params: [],
    async run(ctx) {
      return `URL: ${ctx.detector.url()}`
    },
  },
  {
    name: 'click_text',
    description: 'Click a button, link or other element by its visible text.',
    params: [{ name: 'text', type: 'string', description: 'Visible label to click.', maxLength: 500 }],
    async run(ctx, args) {
      const text = argString(args, 'text')
      const outcome = await ctx.executor.click(CLICKABLE_BY_TEXT, {
        params: { text: xpathLiteral(text) },
        purpose: 'click_text',
      })
      switch (outcome.kind) {
        case 'clicked':
          return `Clicked text: ${text}`
        case 'not_found':
          return `Text not found: ${text}`
        default:
          return `Click failed: ${text}`
      }
    },
  },
  {
    name: 'write_text',
    description: 'Type text into the element that currently has focus.',
    params: [{ name: 'text', type: 'string', description: 'Text to type.', maxLength: 100_000 }],
    async run(ctx, args) {
      const text = argString(args, 'text')
      const res = await ctx.executor.typeFocused(text)
      return res.ok ? `Typed: ${truncate(text, 60)}` : `Typing failed: ${res.error}`
    },
  },
  {
    name: 'press',
    description: "Press a named key (e.g. 'ENTER', 'ESCAPE', 'TAB'), case-insensitive.",
    params: [{ name: 'key', type: 'string', description: 'Key name.', maxLength: 32 }],
    async run(ctx, args) {
      const key = argString(args, 'key')
      const outcome = await ctx.executor.press(key)
      return outcome.kind === 'key_pressed' ? `Pressed: ${key}` : outcome.status
    },
  },
  {
    name: 'scroll_down',
    description: 'Scroll the page down by a number of pixels.',
    params: [{ name: 'pixels', type: 'integer', description: 'Distance in pixels.', default: 1000, min: 0, max: 100_000 }],
    async run(ctx, args) {
      const pixels = argNumber(args, 'pixels') ?? 1000
      const res = await ctx.executor.scrollBy(pixels)
      return res.ok ? `Scrolled down ${pixels}px` : `Scroll failed: ${res.error}`
    },
  },
  {
    name: 'search_text',
    description: 'Find text on the page and scroll the nth occurrence into view.',
    params: [
      { name: 'text', type: 'string', description: 'Text snippet to look for.', maxLength: 500 },
      { name: 'nth', type: 'integer', description: '1-based occurrence to focus.', default: 1, min: 1 },
    ],
    async run(ctx, args) {
      const text = argString(args, 'text')
      const nth = argNumber(args, 'nth') ?? 1
      const matches = await resolveAll(
        ctx.session.driver,
        [xpath('//body//*[contains(text(), {text})]')],
        { text: xpathLiteral(text) },
      )
      if (matches.length === 0) return `no_match:${text}`
      const idx = Math.min(nth, matches.length) - 1
      await matches[idx].scrollIntoView().catch((err: unknown) => {
        ctx.log.debug({ err }, 'scrollIntoView failed')
      })
      return `focused:${idx + 1}/${matches.length}:${text}`
    },
  },
  {
    name: 'human_gate',
    description: 'Pause for a human step (CAPTCHA, 2FA, sign-in) and continue once the operator resumes.',
    params: [{ name: 'message', type: 'string', description: 'Prompt shown to the operator.', default: DEFAULT_GATE_MESSAGE }],
    async run(ctx, args) {
      return ctx.gate.request(argString(args, 'message'))
    },
  },
  {
    name: 'finish_session',
    description: 'Close the browser session.',
    params: [],
    afterClose: true,
    async run(ctx) {
      return (await ctx.session.close()) ? 'Browser closed.' : 'Browser already closed.'
    },
  },
]
