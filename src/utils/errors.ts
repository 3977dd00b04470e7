/** `err.code` when the thrown value carries a string one (Node system errors do). */
export function errorCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') return err.code
  return undefined
}

export function errorMessage(err: unknown, fallback = 'unknown error'): string {
  if (err instanceof Error && err.message) return err.message
  if (typeof err === 'string' && err) return err
  return err == null ? fallback : String(err)
}
