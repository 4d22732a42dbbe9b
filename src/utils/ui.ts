/**
 * Minimal TTY spinner with safe fallbacks.
 * Auto-disables under JSON/NDJSON/quiet or when stdout is not a TTY.
 */
export interface Spinner {
  readonly succeed: (msg?: string) => void
  readonly fail: (msg?: string) => void
  readonly update: (msg: string) => void
}

function canSpin(): boolean {
  if (process.env.NCD_JSON === '1' || process.env.NCD_NDJSON === '1' || process.env.NCD_QUIET === '1') return false
  return Boolean(process.stdout && process.stdout.isTTY)
}

const FRAMES: readonly string[] = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']

export function spinner(label: string): Spinner {
  if (!canSpin()) {
    return {
      succeed: (_msg?: string): void => {},
      fail: (_msg?: string): void => {},
      update: (_msg: string): void => {},
    }
  }
  let i = 0
  let text: string = label
  const tick = (): void => {
    const frame = FRAMES[i = (i + 1) % FRAMES.length]
    process.stdout.write(`\r\u001b[2K${frame} ${text}`)
  }
  const timer: NodeJS.Timeout = setInterval(tick, 120)
  tick()
  const clear = (): void => {
    clearInterval(timer)
    process.stdout.write('\r\u001b[2K')
  }
  return {
    succeed: (msg?: string): void => { clear(); process.stdout.write(`${msg ?? `${label} done`}\n`) },
    fail: (msg?: string): void => { clear(); process.stdout.write(`${msg ?? `${label} failed`}\n`) },
    update: (msg: string): void => { text = msg },
  }
}
