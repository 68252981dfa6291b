import os from 'os'
import path from 'path'

export const APP_DIR_NAME = 'tmux-box'

export function expandHome(inputPath: string): string {
  if (inputPath === '~') return os.homedir()
  if (inputPath.startsWith('~/')) return path.join(os.homedir(), inputPath.slice(2))
  return inputPath
}

/**
 * Strip the `file://` scheme and host part tmux reports when the shell
 * emits OSC 7 (`file://host/path` or `host/path`).
 */
export function normalizePanePath(raw: string): string {
  let value = raw.trim()
  if (!value) return ''
  if (value.startsWith('file://')) value = value.slice('file://'.length)
  if (value.startsWith('/') || value.startsWith('~')) return value
  const slash = value.indexOf('/')
  return slash === -1 ? value : value.slice(slash)
}

/**
 * `ps -t` wants `pts/3` or `ttys000`, tmux reports `/dev/pts/3`
 */
export function normalizeTtyForPs(tty: string): string {
  return tty.trim().replace(/^\/dev\//, '')
}

/**
 * Archive directory: $TBOX_DIR > $XDG_DATA_HOME/tmux-box > ~/.local/share/tmux-box
 */
export function resolveStoreDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.TBOX_DIR?.trim()
  if (override) return path.resolve(expandHome(override))
  const xdg = env.XDG_DATA_HOME?.trim()
  const base = xdg || path.join(os.homedir(), '.local', 'share')
  return path.join(base, APP_DIR_NAME)
}

/**
 * Config file: $TBOX_CONFIG > $XDG_CONFIG_HOME/tmux-box/config.json > ~/.config/tmux-box/config.json
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.TBOX_CONFIG?.trim()
  if (override) return path.resolve(expandHome(override))
  const xdg = env.XDG_CONFIG_HOME?.trim()
  const base = xdg || path.join(os.homedir(), '.config')
  return path.join(base, APP_DIR_NAME, 'config.json')
}
