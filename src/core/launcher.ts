import { resolve } from 'node:path'

import { SERVER_COMMAND } from './defaults'
import type { LaunchSpec, Launcher } from './types'
import { spawnAttached } from '../utils/exec'

export interface ServerTarget {
  app: string
  address: string
  port: number
  cwd: string
}

/** `streamlit run <app> --server.address <address> --server.port <port>` */
export function streamlitLaunchSpec(target: ServerTarget): LaunchSpec {
  return {
    command: SERVER_COMMAND,
    args: ['run', target.app, '--server.address', target.address, '--server.port', String(target.port)],
    cwd: resolve(target.cwd),
  }
}

export function describeLaunch(spec: LaunchSpec): string {
  return [spec.command, ...spec.args].join(' ')
}

export const launchAttached: Launcher = (spec) => spawnAttached(spec.command, spec.args, { cwd: spec.cwd })
