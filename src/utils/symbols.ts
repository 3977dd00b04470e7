/**
 * Terminal symbols - pure ASCII, the Windows console included.
 */

export const symbols = {
  ok: '+',
  err: 'x',
  warn: '!',
  info: 'i',
  step: '>',
  dash: '-',
} as const

export const spinnerFrames = ['-', '\\', '|', '/']
