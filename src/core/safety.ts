import type { Listener } from './types'
import { platform, type Platform } from '../utils/platform'

export interface Protection {
  protected: boolean
  reason?: string
}

const POSIX_PROTECTED_NAMES = ['systemd', 'launchd', 'init', 'kernel_task', 'kthreadd', 'sshd']

const WINDOWS_PROTECTED_NAMES = [
  'system',
  'registry',
  'smss.exe',
  'csrss.exe',
  'wininit.exe',
  'services.exe',
  'lsass.exe',
  'winlogon.exe',
  'svchost.exe',
]

/** Whether a listener must be left alone unless the user passes --force. */
export function protectionFor(l: Listener, p: Platform = platform()): Protection {
  const name = (l.processName ?? '').toLowerCase()

  if (p !== 'win32' && l.pid <= 1) {
    return { protected: true, reason: 'pid 1 (system init)' }
  }

  if (p === 'win32') {
    if (l.pid === 0 || l.pid === 4) return { protected: true, reason: 'system process' }
    if (WINDOWS_PROTECTED_NAMES.some((n) => name === n || name.endsWith('\\' + n))) {
      return { protected: true, reason: 'critical Windows process' }
    }
    return { protected: false }
  }

  if (POSIX_PROTECTED_NAMES.includes(name)) {
    return { protected: true, reason: 'critical system process' }
  }

  return { protected: false }
}
