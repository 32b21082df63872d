/**
 * Layout helpers shared by the screen components
 */

export interface ScreenSize {
  columns: number;
  rows: number;
}

export const MIN_COLUMNS = 40;
export const MIN_ROWS = 12;
export const HEADER_ROWS = 3;
export const FOOTER_ROWS = 3;
export const DEFAULT_SIZE: ScreenSize = { columns: 80, rows: 24 };

// Control characters would move the cursor or change modes mid-frame
const CONTROL_CHARS = /[\u0000-\u0009\u000b-\u001f\u007f-\u009f]/g;

/**
 * Replace control characters (newlines excepted) with a visible dot
 */
export function printable(text: string): string {
  return text.replace(CONTROL_CHARS, "·");
}

/**
 * First index of a `height`-long window over `count` items that keeps
 * `selected` visible
 */
export function scrollOffset(count: number, selected: number, height: number): number {
  if (height <= 0 || count <= height) return 0;
  return Math.min(Math.max(0, selected - height + 1), count - height);
}

export function isTooSmall({ columns, rows }: ScreenSize): boolean {
  return columns < MIN_COLUMNS || rows < MIN_ROWS;
}
