import pc from 'picocolors'

import type { Command } from './args'
import {
  DEFAULT_ADDRESS,
  DEFAULT_APP,
  DEFAULT_GRACE_MS,
  DEFAULT_KILL_TIMEOUT_MS,
  DEFAULT_PORT,
  DEFAULT_WAIT_TIMEOUT_MS,
  PYTHON_ENV_VAR,
} from '../core/defaults'
import { version } from '../version'

const dim = pc.dim
const bold = pc.bold

export function helpText(command: Command | null): string {
  if (command === 'restart') return restartHelp().join('\n')
  if (command === 'fix-indent') return fixIndentHelp().join('\n')

  return [
    `${bold('portkick')} ${dim(`v${version}`)} - restart a dev server on its port, tidy Python indentation`,
    '',
    `${bold('Usage')}`,
    `  portkick restart [options]         ${dim(`free :${DEFAULT_PORT} and relaunch the Streamlit app`)}`,
    `  portkick fix-indent [dir] [opts]   ${dim('run autopep8 over *.py files')}`,
    `  portkick help <command>            ${dim('command options')}`,
    '',
    `${bold('Global options')}`,
    `      --dry-run      ${dim('report what would happen, change nothing')}`,
    `      --pause        ${dim('wait for Enter before exiting')}`,
    `  -h, --help         ${dim('show help')}`,
    `  -v, --version      ${dim('show version')}`,
  ].join('\n')
}

function restartHelp(): string[] {
  return [
    `${bold('portkick restart')} ${dim('- kill whatever listens on the port, wait for it to close, launch the app')}`,
    '',
    `${bold('Options')}`,
    `  -p, --port <n>          ${dim(`port to free and bind (default: ${DEFAULT_PORT})`)}`,
    `      --address <host>    ${dim(`bind address (default: ${DEFAULT_ADDRESS})`)}`,
    `      --app <file>        ${dim(`Streamlit script (default: ${DEFAULT_APP})`)}`,
    `      --cwd <dir>         ${dim('directory to launch from (default: .)')}`,
    `      --grace <ms>        ${dim(`pause after a kill (default: ${DEFAULT_GRACE_MS})`)}`,
    `      --wait-timeout <ms> ${dim(`give up waiting for the port (default: ${DEFAULT_WAIT_TIMEOUT_MS})`)}`,
    `      --kill-timeout <ms> ${dim(`SIGTERM grace before SIGKILL (default: ${DEFAULT_KILL_TIMEOUT_MS})`)}`,
    `  -f, --force             ${dim('kill protected system processes too')}`,
    '',
    `${bold('Examples')}`,
    `  portkick restart                  ${dim(`streamlit run ${DEFAULT_APP} --server.address ${DEFAULT_ADDRESS} --server.port ${DEFAULT_PORT}`)}`,
    `  portkick restart --port 8600      ${dim('another port')}`,
    `  portkick restart --dry-run        ${dim('show the listener and the command only')}`,
  ]
}

function fixIndentHelp(): string[] {
  return [
    `${bold('portkick fix-indent')} ${dim('- install autopep8 if missing, then reformat *.py aggressively')}`,
    '',
    `${bold('Options')}`,
    `  -m, --mode <mode>   ${dim('per-file (default): dir/*.py then pages/*.py, one file at a time')}`,
    `                      ${dim('batch: dir/*.py in a single in-place invocation')}`,
    `                      ${dim('tree: every *.py below dir (skips __pycache__, .git, venv, env)')}`,
    `      --in-place      ${dim('let autopep8 rewrite files itself instead of write-if-changed')}`,
    `  -o, --out <dir>     ${dim('write formatted copies under <dir>, sources untouched')}`,
    `      --python <exe>  ${dim(`interpreter (default: $${PYTHON_ENV_VAR}, else python3 / python on Windows)`)}`,
    '',
    `${bold('Examples')}`,
    `  portkick fix-indent                ${dim('current directory and pages/')}`,
    `  portkick fix-indent src --mode tree`,
    `  portkick fix-indent --out formatted`,
  ]
}

export function printHelp(command: Command | null): void {
  process.stdout.write(helpText(command) + '\n')
}
