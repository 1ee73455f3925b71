import type { SelectorStrategy } from './selectors'

/**
 * Live handle to one DOM node. Valid for a single action only: any
 * navigation invalidates it, so handles are never cached.
 */
export interface ElementRef {
  /** Scroll so the element sits in the middle of the viewport. */
  scrollIntoView(): Promise<void>
  /** Native (input-pipeline) click. Rejects on overlap, detach or timeout. */
  click(timeoutMs: number): Promise<void>
  /** Programmatic click event dispatched straight on the node. */
  dispatchClick(): Promise<void>
  focus(): Promise<void>
  clear(): Promise<void>
  type(text: string): Promise<void>
  text(): Promise<string>
  attribute(name: string): Promise<string | null>
  /** Current value of a form control. */
  value(): Promise<string>
  /** Visible and enabled. */
  isInteractable(): Promise<boolean>
}

/** The only seam between the engine and a browser page. */
export interface PageDriver {
  url(): string
  /** Point-in-time query; never waits. */
  query(strategy: SelectorStrategy, pattern: string): Promise<ElementRef[]>
  goto(url: string, timeoutMs: number): Promise<void>
  back(): Promise<void>
  /** Global key event, delivered to whatever has focus. */
  pressKey(key: string): Promise<void>
  /** Types into whatever has focus. */
  typeText(text: string): Promise<void>
  scrollBy(dx: number, dy: number): Promise<void>
  close(): Promise<void>
}
