const ANSI_PATTERN =
  // eslint-disable-next-line no-control-regex
  /[\u001B\u009B][[\]()#;?]*(?:[0-9]{1,4}(?:;[0-9]{0,4})*)?[0-9A-ORZcf-nqry=><]/g

export function stripAnsi(input: string): string {
  return input.replace(ANSI_PATTERN, '')
}

export function truncate(input: string, width: number): string {
  if (width <= 0) return ''
  const chars = Array.from(stripAnsi(input))
  if (chars.length <= width) return chars.join('')
  return chars.slice(0, width - 1).join('') + '…'
}

export function uniqBy<T>(items: T[], key: (t: T) => string): T[] {
  const seen = new Set<string>()
  const out: T[] = []
  for (const it of items) {
    const k = key(it)
    if (seen.has(k)) continue
    seen.add(k)
    out.push(it)
  }
  return out
}
