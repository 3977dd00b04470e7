export const DEFAULT_PORT = 8502
export const DEFAULT_ADDRESS = '0.0.0.0'
export const DEFAULT_APP = 'streamlit_app.py'
export const SERVER_COMMAND = 'streamlit'

/** Pause after a kill before the port is polled. */
export const DEFAULT_GRACE_MS = 2000
export const DEFAULT_WAIT_TIMEOUT_MS = 10_000
export const POLL_INTERVAL_MS = 250
export const DEFAULT_KILL_TIMEOUT_MS = 0

export const FORMATTER_PACKAGE = 'autopep8'
export const FORMATTER_FLAGS = ['--aggressive', '--aggressive'] as const
export const PAGES_DIR = 'pages'
export const SKIPPED_DIRS = ['__pycache__', '.git', 'venv', 'env'] as const
export const PYTHON_EXT = '.py'

export const PYTHON_ENV_VAR = 'PORTKICK_PYTHON'

export function defaultPython(env: NodeJS.ProcessEnv = process.env, plat: NodeJS.Platform = process.platform): string {
  const fromEnv = env[PYTHON_ENV_VAR]?.trim()
  if (fromEnv) return fromEnv
  return plat === 'win32' ? 'python' : 'python3'
}
