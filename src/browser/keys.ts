/** Planner-facing key names (case-insensitive) → page key names. */
const KEY_TABLE: Readonly<Record<string, string>> = {
  ENTER: 'Enter',
  RETURN: 'Enter',
  ESCAPE: 'Escape',
  ESC: 'Escape',
  TAB: 'Tab',
  SPACE: ' ',
  BACKSPACE: 'Backspace',
  BACK_SPACE: 'Backspace',
  DELETE: 'Delete',
  INSERT: 'Insert',
  HOME: 'Home',
  END: 'End',
  PAGE_UP: 'PageUp',
  PAGE_DOWN: 'PageDown',
  UP: 'ArrowUp',
  DOWN: 'ArrowDown',
  LEFT: 'ArrowLeft',
  RIGHT: 'ArrowRight',
  ARROW_UP: 'ArrowUp',
  ARROW_DOWN: 'ArrowDown',
  ARROW_LEFT: 'ArrowLeft',
  ARROW_RIGHT: 'ArrowRight',
}

export function lookupKey(name: string): string | null {
  return KEY_TABLE[name.trim().toUpperCase()] ?? null
}

export function knownKeys(): string[] {
  return Object.keys(KEY_TABLE)
}
