import crypto from 'crypto'
import fs from 'fs'
import path from 'path'
import type { Logger } from '../logger'

export interface TraceEntry {
  ts?: string
  v?: number
  run_id?: string
  action_id?: string
  type: 'action' | 'run' | 'optimization' | 'recovery'
  action?: string
  url?: string
  target?: string
  params?: Record<string, unknown>
  result?: Record<string, unknown>
  error?: string | null
}

export function actionId(): string {
  return 'act_' + crypto.randomBytes(6).toString('hex')
}

export function runId(): string {
  return 'run_' + crypto.randomBytes(4).toString('hex')
}

/**
 * Append-only JSONL trace, one file per UTC day. A write error disables the
 * trace for the rest of the process; the run itself carries on.
 */
export class TraceLogger {
  private currentDate = ''
  private stream: fs.WriteStream | null = null
  private failed = false

  constructor(private readonly dir: string, private readonly logger?: Logger) {
    fs.mkdirSync(dir, { recursive: true })
  }

  write(entry: TraceEntry): void {
    if (this.failed) return
    const now = new Date()
    const date = now.toISOString().slice(0, 10)
    if (date !== this.currentDate || !this.stream) {
      this.stream?.end()
      this.currentDate = date
      this.stream = this.open(this.fileFor(date))
    }
    const record: TraceEntry = { ts: now.toISOString(), v: 1, ...entry }
    this.stream.write(JSON.stringify(record) + '\n')
  }

  /** Resolves once buffered entries are on disk. */
  close(): Promise<void> {
    const stream = this.stream
    this.stream = null
    this.currentDate = ''
    if (!stream) return Promise.resolve()
    return new Promise((resolve) => {
      stream.once('close', () => resolve())
      stream.end()
    })
  }

  tail(runIdFilter: string | undefined, lines: number, date = new Date().toISOString().slice(0, 10)): TraceEntry[] {
    const file = this.fileFor(date)
    if (!fs.existsSync(file)) return []
    const all = fs
      .readFileSync(file, 'utf8')
      .split('\n')
      .filter(Boolean)
      .flatMap((line): TraceEntry[] => {
        try {
          return [JSON.parse(line)]
        } catch {
          return [] // partially written line
        }
      })
      .filter((e) => !runIdFilter || e.run_id === runIdFilter)
    return all.slice(-lines)
  }

  private open(file: string): fs.WriteStream {
    const stream = fs.createWriteStream(file, { flags: 'a' })
    stream.on('error', (err) => {
      this.logger?.warn({ file, err: err.message }, 'trace write failed')
      this.failed = true
      if (this.stream === stream) this.stream = null
    })
    return stream
  }

  private fileFor(date: string): string {
    return path.join(this.dir, `${date}.jsonl`)
  }
}
