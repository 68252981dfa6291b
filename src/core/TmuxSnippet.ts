export const AUTOSAVE_HOOKS = [
  'client-session-changed',
  'client-detached',
  'session-renamed',
  'window-renamed',
  'window-layout-changed',
] as const

export interface SnippetOptions {
  /** How tmux should invoke tbox */
  command: string
  throttleSeconds: number
}

/**
 * tmux.conf fragment: autosave hooks, `W` opens the selector in a popup,
 * `X` saves then kills the current session.
 */
export function tmuxSnippet({ command, throttleSeconds }: SnippetOptions): string {
  const cmd = command.replace(/"/g, '\\"')
  const lines = [
    '# tbox session persistence',
    `# Requires: ${cmd}`,
    `set -g @tbox_autosave "${cmd} autosave --quiet --throttle-seconds ${throttleSeconds}"`,
    ...AUTOSAVE_HOOKS.map((hook) => `set-hook -g ${hook} "run-shell -b \\"#{@tbox_autosave}\\""`),
    `bind W popup -E "${cmd} select"`,
    'bind X confirm-before -p "kill-session #{session_name}? (y/n)" ' +
      `"run-shell -b \\"${cmd} save #{session_name} >/dev/null 2>&1; tmux kill-session -t #{session_name}\\""`,
  ]
  return `${lines.join('\n')}\n`
}
