import { colors } from './colors'

/**
 * Color a unified diff for the terminal: additions green, removals red, hunk headers cyan.
 */
export function formatDiffHuman(diff: string): string {
  const out: string[] = []
  for (const ln of diff.replace(/\n$/, '').split('\n')) {
    if (ln.startsWith('+++') || ln.startsWith('---') || ln.startsWith('===') || ln.startsWith('Index:')) out.push(colors.dim(ln))
    else if (ln.startsWith('@@')) out.push(colors.cyan(ln))
    else if (ln.startsWith('+')) out.push(colors.green(ln))
    else if (ln.startsWith('-')) out.push(colors.red(ln))
    else out.push(ln)
  }
  return out.join('\n')
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`
  return `${(ms / 1000).toFixed(1)}s`
}
