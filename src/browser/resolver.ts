import type { ElementRef, PageDriver } from './driver'
import { CandidateList, CandidateSelector, PatternParams, fillPattern } from './selectors'
import { SessionUnavailableError } from './session'

export interface ResolvedElement {
  element: ElementRef
  /** Position of the winning entry in its candidate list (diagnostics). */
  index: number
  selector: CandidateSelector
  /** Pattern after placeholder substitution. */
  pattern: string
}

/**
 * Walk the list in declared order and return the first node of the first
 * entry that matches. One snapshot query per entry, no waiting. A selector
 * the page engine rejects counts as no match; a dead page does not.
 */
export async function resolve(
  driver: PageDriver,
  list: CandidateList,
  params?: PatternParams,
): Promise<ResolvedElement | null> {
  for (let index = 0; index < list.length; index++) {
    const selector = list[index]
    const pattern = fillPattern(selector.pattern, params)
    let matches: ElementRef[]
    try {
      matches = await driver.query(selector.strategy, pattern)
    } catch (err) {
      if (err instanceof SessionUnavailableError) throw err
      continue // malformed selector for this engine
    }
    if (matches.length > 0) {
      return { element: matches[0], index, selector, pattern }
    }
  }
  return null
}

/** Every match of the first matching entry, for list-valued reads. */
export async function resolveAll(
  driver: PageDriver,
  list: CandidateList,
  params?: PatternParams,
): Promise<ElementRef[]> {
  for (const selector of list) {
    try {
      const matches = await driver.query(selector.strategy, fillPattern(selector.pattern, params))
      if (matches.length > 0) return matches
    } catch (err) {
      if (err instanceof SessionUnavailableError) throw err
    }
  }
  return []
}
