import { describe, expect, it } from 'vitest'

import { displayPath, formatKill, formatListener, formatOutcome, formatTool } from './renderer'
import type { Listener } from '../core/types'
import { stripAnsi } from '../utils/strings'

const plain = (s: string) => stripAnsi(s)
const l: Listener = { port: 8502, pid: 4242, processName: 'python3', localAddress: '0.0.0.0' }

describe('renderer', () => {
  it('formats a listener', () => {
    expect(plain(formatListener(l))).toBe('8502 #4242 (python3) 0.0.0.0')
    expect(plain(formatListener({ port: 8502, pid: 7 }))).toBe('8502 #7')
  })

  it('formats each kill outcome', () => {
    const bare: Listener = { port: 8502, pid: 4242 }
    expect(plain(formatKill({ status: 'killed', pid: 4242, method: 'SIGTERM' }, bare))).toBe('+ killed 8502 #4242 SIGTERM')
    expect(plain(formatKill({ status: 'not-found', pid: 4242, method: 'already-exited' }, bare))).toBe(
      'i already gone 8502 #4242',
    )
    expect(plain(formatKill({ status: 'refused', pid: 1, reason: 'pid 1 (system init)' }, { port: 8502, pid: 1 }))).toBe(
      'x refused 8502 #1 pid 1 (system init)',
    )
    expect(
      plain(formatKill({ status: 'error', pid: 4242, method: 'taskkill /F', message: 'access denied', errorCode: 'EPERM' }, bare)),
    ).toBe('x failed 8502 #4242 access denied')
  })

  it('formats tool status', () => {
    expect(plain(formatTool({ status: 'present', pkg: 'autopep8' }))).toBe('+ autopep8 already installed')
    expect(plain(formatTool({ status: 'install-failed', pkg: 'autopep8', message: 'offline' }))).toBe(
      'x autopep8 install failed: offline',
    )
  })

  it('formats file outcomes relative to the root', () => {
    expect(plain(formatOutcome({ file: '/p/a.py', status: 'unchanged' }, '/p'))).toBe('  - a.py unchanged')
    expect(plain(formatOutcome({ file: '/p/a.py', status: 'changed', written: '/out/a.py' }, '/p'))).toBe(
      '  + a.py -> /out/a.py',
    )
    expect(plain(formatOutcome({ file: '/p/a.py', status: 'failed', message: 'E999' }, '/p'))).toBe('  x a.py E999')
  })

  it('keeps paths outside the root absolute', () => {
    expect(displayPath('/elsewhere/a.py', '/p')).toBe('/elsewhere/a.py')
    expect(displayPath('/p/pages/b.py', '/p')).toBe('pages/b.py')
  })
})
