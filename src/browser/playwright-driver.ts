import type { BrowserContext, ElementHandle, Page } from 'playwright-core'
import type { ElementRef, PageDriver } from './driver'
import type { SelectorStrategy } from './selectors'
import { SessionUnavailableError } from './session'

const GONE = /Target (page, context or browser )?(has been )?closed|Browser has been closed|crashed/i

/** Re-raise "page is gone" failures as SessionUnavailableError. */
async function guarded<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn()
  } catch (err) {
    if (err instanceof Error && GONE.test(err.message)) {
      throw new SessionUnavailableError(err.message, err)
    }
    throw err
  }
}

class PlaywrightElement implements ElementRef {
  constructor(
    private readonly page: Page,
    private readonly handle: ElementHandle<SVGElement | HTMLElement>,
  ) {}

  scrollIntoView(): Promise<void> {
    return guarded(() =>
      this.handle.evaluate((el) => el.scrollIntoView({ block: 'center', inline: 'center' })),
    )
  }

  click(timeoutMs: number): Promise<void> {
    return guarded(() => this.handle.click({ timeout: timeoutMs }))
  }

  dispatchClick(): Promise<void> {
    return guarded(() => this.handle.dispatchEvent('click'))
  }

  focus(): Promise<void> {
    return guarded(() => this.handle.focus())
  }

  clear(): Promise<void> {
    return guarded(() => this.handle.fill(''))
  }

  async type(text: string): Promise<void> {
    await guarded(() => this.handle.focus())
    await guarded(() => this.page.keyboard.type(text))
  }

  text(): Promise<string> {
    return guarded(() => this.handle.innerText())
  }

  attribute(name: string): Promise<string | null> {
    return guarded(() => this.handle.getAttribute(name))
  }

  value(): Promise<string> {
    return guarded(() =>
      this.handle.evaluate((el) =>
        el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement || el instanceof HTMLSelectElement
          ? el.value
          : '',
      ),
    )
  }

  async isInteractable(): Promise<boolean> {
    return guarded(async () => (await this.handle.isVisible()) && (await this.handle.isEnabled()))
  }
}

/** PageDriver over one playwright-core page. */
export class PlaywrightDriver implements PageDriver {
  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
  ) {}

  url(): string {
    return this.page.url()
  }

  async query(strategy: SelectorStrategy, pattern: string): Promise<ElementRef[]> {
    const handles = await guarded(() => this.page.$$(`${strategy}=${pattern}`))
    return handles.map((h) => new PlaywrightElement(this.page, h))
  }

  async goto(url: string, timeoutMs: number): Promise<void> {
    await guarded(() => this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs }))
  }

  async back(): Promise<void> {
    await guarded(() => this.page.goBack({ waitUntil: 'domcontentloaded' }))
  }

  pressKey(key: string): Promise<void> {
    return guarded(() => this.page.keyboard.press(key))
  }

  typeText(text: string): Promise<void> {
    return guarded(() => this.page.keyboard.type(text))
  }

  scrollBy(dx: number, dy: number): Promise<void> {
    return guarded(() => this.page.mouse.wheel(dx, dy))
  }

  async close(): Promise<void> {
    await this.context.close()
  }
}
