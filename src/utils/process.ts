import { spawn } from 'node:child_process'

interface RunArgs {
  /** Executable, optionally followed by leading arguments ("python3 -m netconify"). */
  readonly cmd: string
  /** Appended verbatim; never passed through a shell. */
  readonly args?: readonly string[]
}

interface RunResult { readonly ok: boolean; readonly exitCode: number; readonly stdout: string; readonly stderr: string }

interface ProcUtil {
  readonly run: (args: RunArgs) => Promise<RunResult>
  readonly has: (cmd: string) => Promise<boolean>
}

function splitCmd(cmdline: string): readonly string[] {
  const matches: RegExpMatchArray | null = cmdline.match(/(?:[^\s"']+|"[^"]*"|'[^']*')+/g)
  if (matches === null) return []
  return matches.map((p: string): string => {
    if ((p.startsWith('"') && p.endsWith('"')) || (p.startsWith("'") && p.endsWith("'"))) return p.slice(1, -1)
    return p
  })
}

async function run(args: RunArgs): Promise<RunResult> {
  const parts: readonly string[] = [...splitCmd(args.cmd), ...(args.args ?? [])]
  const file: string = parts[0] ?? ''
  const fileArgs: readonly string[] = parts.slice(1)
  return await new Promise<RunResult>((resolve) => {
    if (file.length === 0) return resolve({ ok: false, exitCode: 1, stdout: '', stderr: 'empty command' })
    const cp = spawn(file, [...fileArgs], { windowsHide: true })
    const outChunks: Buffer[] = []
    const errChunks: Buffer[] = []
    cp.stdout?.on('data', (d: Buffer) => { outChunks.push(Buffer.from(d)) })
    cp.stderr?.on('data', (d: Buffer) => { errChunks.push(Buffer.from(d)) })
    cp.on('error', (err: Error) => {
      const stderr: string = Buffer.concat(errChunks).toString()
      resolve({ ok: false, exitCode: 1, stdout: Buffer.concat(outChunks).toString(), stderr: stderr.length > 0 ? stderr : err.message })
    })
    cp.on('close', (code: number | null) => {
      const exit: number = code === null ? 1 : code
      resolve({ ok: exit === 0, exitCode: exit, stdout: Buffer.concat(outChunks).toString(), stderr: Buffer.concat(errChunks).toString() })
    })
  })
}

async function has(cmd: string): Promise<boolean> {
  const res: RunResult = await run({ cmd, args: ['--version'] })
  return res.ok
}

export const proc: ProcUtil = { run, has }
