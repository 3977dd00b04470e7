import { describe, expect, it } from 'vitest'

import { parseAddrPort, parseLsof, parseNetstat, parseSs } from './parsers'

const NETSTAT = [
  '',
  'Active Connections',
  '',
  '  Proto  Local Address          Foreign Address        State           PID',
  '  TCP    0.0.0.0:135            0.0.0.0:0              LISTENING       1004',
  '  TCP    0.0.0.0:8502           0.0.0.0:0              LISTENING       5120',
  '  TCP    127.0.0.1:8502         127.0.0.1:53122        ESTABLISHED     5120',
  '  TCP    [::]:8502              [::]:0                 LISTENING       5120',
  '',
].join('\r\n')

const SS = [
  'LISTEN 0      5            0.0.0.0:8502      0.0.0.0:*    users:(("streamlit",pid=4242,fd=6))',
  'LISTEN 0      128             [::]:8502         [::]:*',
  '',
].join('\n')

const LSOF = [
  'COMMAND    PID USER   FD   TYPE             DEVICE SIZE/OFF NODE NAME',
  'python3.1 4242  dev    6u  IPv4 0x1f2e3d4c5b6a7988      0t0  TCP *:8502 (LISTEN)',
  'python3.1 4242  dev    7u  IPv6 0x1f2e3d4c5b6a7989      0t0  TCP [::1]:8502 (LISTEN)',
  '',
].join('\n')

describe('parseAddrPort', () => {
  it('splits IPv4, wildcard and bracketed IPv6 addresses', () => {
    expect(parseAddrPort('0.0.0.0:8502')).toEqual({ port: 8502, address: '0.0.0.0' })
    expect(parseAddrPort('*:8502')).toEqual({ port: 8502, address: '*' })
    expect(parseAddrPort('[::]:8502')).toEqual({ port: 8502, address: '::' })
  })

  it('rejects tokens without a usable port', () => {
    expect(parseAddrPort('localhost')).toEqual({ port: null })
    expect(parseAddrPort('0.0.0.0:70000')).toEqual({ port: null })
    expect(parseAddrPort('0.0.0.0:*')).toEqual({ port: null })
  })
})

describe('parseNetstat', () => {
  it('keeps LISTENING rows only and skips headers', () => {
    const rows = parseNetstat(NETSTAT).map(({ port, pid, localAddress, source }) => ({ port, pid, localAddress, source }))
    expect(rows).toEqual([
      { port: 135, pid: 1004, localAddress: '0.0.0.0', source: 'netstat' },
      { port: 8502, pid: 5120, localAddress: '0.0.0.0', source: 'netstat' },
      { port: 8502, pid: 5120, localAddress: '::', source: 'netstat' },
    ])
  })

  it('returns nothing for empty output', () => {
    expect(parseNetstat('')).toEqual([])
  })
})

describe('parseSs', () => {
  it('reads pid and process name, dropping rows ss could not attribute', () => {
    expect(parseSs(SS)).toEqual([
      {
        port: 8502,
        pid: 4242,
        localAddress: '0.0.0.0',
        processName: 'streamlit',
        raw: 'LISTEN 0      5            0.0.0.0:8502      0.0.0.0:*    users:(("streamlit",pid=4242,fd=6))',
        source: 'ss',
      },
    ])
  })
})

describe('parseLsof', () => {
  it('reads LISTEN sockets after the header', () => {
    const rows = parseLsof(LSOF).map(({ port, pid, localAddress, processName }) => ({ port, pid, localAddress, processName }))
    expect(rows).toEqual([
      { port: 8502, pid: 4242, localAddress: '*', processName: 'python3.1' },
      { port: 8502, pid: 4242, localAddress: '::1', processName: 'python3.1' },
    ])
  })

  it('ignores output without a header', () => {
    expect(parseLsof('python3 4242 dev 6u IPv4 0x1 0t0 TCP *:8502 (LISTEN)')).toEqual([])
  })
})
