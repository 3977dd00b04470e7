export type Platform = 'win32' | 'darwin' | 'linux' | 'other'

export function platform(p: NodeJS.Platform = process.platform): Platform {
  if (p === 'win32' || p === 'darwin' || p === 'linux') return p
  return 'other'
}
