import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import type { Logger } from '../logger'

const HistoryFileSchema = z.record(z.string(), z.array(z.string()))

/**
 * Remembers which (tag, text, id) keys resolved successfully per action kind.
 * Bounded per action; the oldest key is dropped first. Optionally backed by a
 * JSON file so the bonus survives across runs.
 */
export class HistoryStore {
  private readonly byAction = new Map<string, string[]>()

  constructor(
    private readonly logger: Logger,
    private readonly file?: string,
    private readonly maxPerAction = 500,
  ) {}

  has(action: string, key: string): boolean {
    return this.byAction.get(action)?.includes(key) ?? false
  }

  record(action: string, key: string): void {
    const keys = this.byAction.get(action) ?? []
    const at = keys.indexOf(key)
    if (at !== -1) keys.splice(at, 1)
    keys.push(key)
    if (keys.length > this.maxPerAction) keys.splice(0, keys.length - this.maxPerAction)
    this.byAction.set(action, keys)
  }

  size(): number {
    let n = 0
    for (const keys of this.byAction.values()) n += keys.length
    return n
  }

  load(): void {
    if (!this.file || !fs.existsSync(this.file)) return
    try {
      const parsed = HistoryFileSchema.parse(JSON.parse(fs.readFileSync(this.file, 'utf8')))
      for (const [action, keys] of Object.entries(parsed)) {
        this.byAction.set(action, keys.slice(-this.maxPerAction))
      }
    } catch (err) {
      // Corrupt history only costs the bonus; start fresh.
      this.logger.warn({ file: this.file, err: err instanceof Error ? err.message : String(err) }, 'ignoring unreadable history file')
    }
  }

  save(): void {
    if (!this.file) return
    try {
      fs.mkdirSync(path.dirname(this.file), { recursive: true })
      fs.writeFileSync(this.file, JSON.stringify(Object.fromEntries(this.byAction), null, 2))
    } catch (err) {
      this.logger.warn({ file: this.file, err: err instanceof Error ? err.message : String(err) }, 'could not persist history')
    }
  }
}
