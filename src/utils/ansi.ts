const ESC = '\u001B['

export const ansi = {
  /** Clear the current line */
  clearLine: `${ESC}2K`,
  hideCursor: `${ESC}?25l`,
  showCursor: `${ESC}?25h`,
} as const
