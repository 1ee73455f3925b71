import { JSDOM } from 'jsdom'
import type { ElementRef, PageDriver } from '../../src/browser/driver'
import type { SelectorStrategy } from '../../src/browser/selectors'

export type Pages = Record<string, string>

export interface ClickRecord {
  id: string
  mechanism: 'native' | 'programmatic'
}

const NOT_FOUND_PAGE = '<html><body><h1>Not found</h1></body></html>'

function label(el: Element): string {
  return el.id || el.getAttribute('name') || el.tagName.toLowerCase()
}

/**
 * In-process PageDriver over jsdom. Markup hooks:
 *   data-nav="<url>"           clicking the element (or a descendant) loads <url>;
 *                              on a form, ENTER inside it does too
 *   data-fail-native           native clicks throw
 *   data-fail-dispatch[="N"]   programmatic clicks throw (only the first N, if given)
 *   data-fail-clear            clear() throws
 */
export class DomDriver implements PageDriver {
  private dom: JSDOM
  private current = ''
  private readonly history: string[] = []
  focused: Element | null = null
  readonly keys: string[] = []
  readonly typed: string[] = []
  readonly scrolls: number[] = []
  readonly clicks: ClickRecord[] = []
  readonly scrolledIntoView: string[] = []
  readonly visited: string[] = []
  closed = false
  failClose = false
  failGoto = false

  constructor(
    readonly pages: Pages,
    start: string,
  ) {
    this.dom = this.build(start)
  }

  get document(): Document {
    return this.dom.window.document
  }

  load(url: string): void {
    this.dom = this.build(url)
  }

  private build(url: string): JSDOM {
    this.current = url
    this.visited.push(url)
    this.focused = null
    return new JSDOM(this.pages[url] ?? NOT_FOUND_PAGE, { url })
  }

  url(): string {
    return this.current
  }

  async query(strategy: SelectorStrategy, pattern: string): Promise<ElementRef[]> {
    const doc = this.document
    let found: Element[]
    if (strategy === 'css') {
      found = Array.from(doc.querySelectorAll(pattern))
    } else {
      const { XPathResult, Element: ElementCtor } = this.dom.window
      const snap = doc.evaluate(pattern, doc, null, XPathResult.ORDERED_NODE_SNAPSHOT_TYPE, null)
      found = []
      for (let i = 0; i < snap.snapshotLength; i++) {
        const node = snap.snapshotItem(i)
        if (node instanceof ElementCtor) found.push(node)
      }
    }
    return found.map((el) => new DomElement(this, el))
  }

  async goto(url: string): Promise<void> {
    if (this.failGoto) throw new Error('net::ERR_NAME_NOT_RESOLVED')
    this.history.push(this.current)
    this.load(url)
  }

  async back(): Promise<void> {
    const prev = this.history.pop()
    if (prev !== undefined) this.load(prev)
  }

  async pressKey(key: string): Promise<void> {
    this.keys.push(key)
    if (key !== 'Enter' || !this.focused) return
    const form = this.focused.closest('form[data-nav]')
    const target = form?.getAttribute('data-nav')
    if (target) this.navigate(target)
  }

  async typeText(text: string): Promise<void> {
    this.typed.push(text)
    const el = this.focused
    if (el && 'value' in el && typeof el.value === 'string') el.value += text
  }

  async scrollBy(_dx: number, dy: number): Promise<void> {
    this.scrolls.push(dy)
  }

  async close(): Promise<void> {
    if (this.failClose) throw new Error('Target page, context or browser has been closed')
    this.closed = true
  }

  /** Follow a link-like navigation from the page itself. */
  navigate(url: string): void {
    this.history.push(this.current)
    this.load(url)
  }
}

class DomElement implements ElementRef {
  constructor(
    private readonly driver: DomDriver,
    private readonly el: Element,
  ) {}

  async scrollIntoView(): Promise<void> {
    this.driver.scrolledIntoView.push(label(this.el))
  }

  async click(): Promise<void> {
    if (this.el.closest('[data-fail-native]')) throw new Error('element intercepts pointer events')
    if (!(await this.isInteractable())) throw new Error('element is not visible or enabled')
    this.activate('native')
  }

  async dispatchClick(): Promise<void> {
    const failing = this.el.closest('[data-fail-dispatch]')
    if (failing) {
      const remaining = failing.getAttribute('data-fail-dispatch')
      if (!remaining) throw new Error('dispatch rejected')
      const n = Number(remaining)
      if (n > 0) {
        failing.setAttribute('data-fail-dispatch', String(n - 1))
        throw new Error('dispatch rejected')
      }
    }
    this.activate('programmatic')
  }

  async focus(): Promise<void> {
    this.driver.focused = this.el
  }

  async clear(): Promise<void> {
    if (this.el.hasAttribute('data-fail-clear')) throw new Error('element is not clearable')
    if ('value' in this.el && typeof this.el.value === 'string') this.el.value = ''
  }

  async type(text: string): Promise<void> {
    if (!('value' in this.el) || typeof this.el.value !== 'string') throw new Error('element is not editable')
    this.driver.focused = this.el
    this.el.value += text
  }

  async text(): Promise<string> {
    return this.el.textContent ?? ''
  }

  async attribute(name: string): Promise<string | null> {
    return this.el.getAttribute(name)
  }

  async value(): Promise<string> {
    return 'value' in this.el && typeof this.el.value === 'string' ? this.el.value : ''
  }

  async isInteractable(): Promise<boolean> {
    return !this.el.closest('[hidden]') && !this.el.hasAttribute('disabled')
  }

  private activate(mechanism: ClickRecord['mechanism']): void {
    this.driver.clicks.push({ id: label(this.el), mechanism })
    const tag = this.el.tagName.toLowerCase()
    if (tag === 'input' || tag === 'textarea' || tag === 'select') this.driver.focused = this.el
    const target = this.el.closest('[data-nav]:not(form)')?.getAttribute('data-nav')
    if (target) this.driver.navigate(target)
  }
}
