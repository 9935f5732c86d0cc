import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import type { Logger } from '../logger'

export const FragmentStepSchema = z.object({
  action: z.string(),
  target: z.string(),
  value: z.string().nullable(),
})

export const FlowFragmentSchema = z.object({
  id: z.number().int().positive(),
  site: z.string(),
  start_url: z.string(),
  end_url: z.string(),
  steps: z.array(FragmentStepSchema),
  success_count: z.number().int().min(1),
  created_at: z.string(),
  last_used_at: z.string(),
})

const StoreFileSchema = z.object({
  version: z.literal(1),
  next_id: z.number().int().positive(),
  fragments: z.array(FlowFragmentSchema),
})

export type FragmentStep = z.infer<typeof FragmentStepSchema>
export type FlowFragment = z.infer<typeof FlowFragmentSchema>
type StoreFile = z.infer<typeof StoreFileSchema>

export interface FragmentInput {
  site: string
  start_url: string
  end_url: string
  steps: FragmentStep[]
}

export interface PruneOptions {
  olderThanDays?: number
  /** Drop fragments confirmed fewer times than this. */
  minSuccess?: number
  site?: string
}

export interface FragmentStoreOptions {
  /** Fragments not used for this many days are dropped when the file is read. */
  ttlDays?: number
  lockTimeoutMs?: number
  staleLockMs?: number
  now?: () => Date
}

export class FragmentStoreError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'FragmentStoreError'
  }
}

const DAY_MS = 24 * 60 * 60 * 1000

export function fragmentKey(f: FragmentInput): string {
  return JSON.stringify([f.site, f.start_url, f.end_url, f.steps.map((s) => [s.action, s.target, s.value])])
}

/**
 * Durable fragment table in one JSON file. Every mutation runs under an
 * in-process queue and an exclusive lock file, then replaces the file
 * atomically, so concurrent writers on the same key serialize across
 * processes as well.
 */
export class FragmentStore {
  private queue: Promise<unknown> = Promise.resolve()
  private readonly lockFile: string
  private readonly ttlDays?: number
  private readonly lockTimeoutMs: number
  private readonly staleLockMs: number
  private readonly now: () => Date

  constructor(readonly file: string, private readonly logger: Logger, opts: FragmentStoreOptions = {}) {
    this.lockFile = `${file}.lock`
    this.ttlDays = opts.ttlDays
    this.lockTimeoutMs = opts.lockTimeoutMs ?? 5000
    this.staleLockMs = opts.staleLockMs ?? 30000
    this.now = opts.now ?? (() => new Date())
  }

  async all(): Promise<FlowFragment[]> {
    return (await this.read()).fragments
  }

  /** Insert, or bump success_count on an identical (site, start_url, steps, end_url). */
  async saveOrUpdate(input: FragmentInput): Promise<{ fragment: FlowFragment; created: boolean }> {
    return this.mutate((data) => {
      const key = fragmentKey(input)
      const ts = this.now().toISOString()
      const existing = data.fragments.find((f) => fragmentKey(f) === key)
      if (existing) {
        existing.success_count += 1
        existing.last_used_at = ts
        return { fragment: { ...existing }, created: false }
      }
      const fragment: FlowFragment = {
        id: data.next_id,
        ...input,
        steps: input.steps.map((s) => ({ ...s })),
        success_count: 1,
        created_at: ts,
        last_used_at: ts,
      }
      data.next_id += 1
      data.fragments.push(fragment)
      return { fragment: { ...fragment }, created: true }
    })
  }

  /** Marks a fragment as reused so TTL pruning keeps it. */
  async touch(id: number): Promise<void> {
    await this.mutate((data) => {
      const f = data.fragments.find((x) => x.id === id)
      if (f) f.last_used_at = this.now().toISOString()
    })
  }

  async prune(opts: PruneOptions): Promise<number> {
    const cutoff = opts.olderThanDays !== undefined ? this.now().getTime() - opts.olderThanDays * DAY_MS : null
    return this.mutate((data) => {
      const before = data.fragments.length
      data.fragments = data.fragments.filter((f) => {
        if (opts.site && f.site !== opts.site) return true
        if (cutoff !== null && Date.parse(f.last_used_at) < cutoff) return false
        if (opts.minSuccess !== undefined && f.success_count < opts.minSuccess) return false
        return true
      })
      return before - data.fragments.length
    })
  }

  async clear(): Promise<number> {
    return this.mutate((data) => {
      const n = data.fragments.length
      data.fragments = []
      return n
    })
  }

  // -------------------------------------------------------------------------
  // File access
  // -------------------------------------------------------------------------

  private async read(): Promise<StoreFile> {
    let raw: string
    try {
      raw = await fs.promises.readFile(this.file, 'utf8')
    } catch (err) {
      if (isErrno(err, 'ENOENT')) return { version: 1, next_id: 1, fragments: [] }
      throw err
    }
    let parsed: StoreFile
    try {
      parsed = StoreFileSchema.parse(JSON.parse(raw))
    } catch (err) {
      throw new FragmentStoreError(`fragment store ${this.file} is unreadable: ${err instanceof Error ? err.message : String(err)}`)
    }
    if (this.ttlDays !== undefined) {
      const cutoff = this.now().getTime() - this.ttlDays * DAY_MS
      parsed.fragments = parsed.fragments.filter((f) => Date.parse(f.last_used_at) >= cutoff)
    }
    return parsed
  }

  private async write(data: StoreFile): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.file), { recursive: true })
    const tmp = `${this.file}.${process.pid}.tmp`
    await fs.promises.writeFile(tmp, JSON.stringify(data, null, 2))
    await fs.promises.rename(tmp, this.file)
  }

  private mutate<T>(fn: (data: StoreFile) => T): Promise<T> {
    const run = this.queue.then(() => this.withLock(async () => {
      const data = await this.read()
      const result = fn(data)
      await this.write(data)
      return result
    }))
    // Keep the chain alive after a failed mutation; the caller still sees the error.
    this.queue = run.catch((err: unknown) => {
      this.logger.debug({ err: err instanceof Error ? err.message : String(err) }, 'fragment store mutation failed')
    })
    return run
  }

  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await fs.promises.mkdir(path.dirname(this.file), { recursive: true })
    const deadline = Date.now() + this.lockTimeoutMs
    for (;;) {
      try {
        const handle = await fs.promises.open(this.lockFile, 'wx')
        await handle.writeFile(String(process.pid))
        await handle.close()
        break
      } catch (err) {
        if (!isErrno(err, 'EEXIST')) throw err
        if (await this.clearStaleLock()) continue
        if (Date.now() >= deadline) throw new FragmentStoreError(`timed out waiting for ${this.lockFile}`)
        await new Promise((r) => setTimeout(r, 25))
      }
    }
    try {
      return await fn()
    } finally {
      await fs.promises.rm(this.lockFile, { force: true })
    }
  }

  /** A lock whose owner is gone, or that is older than staleLockMs, is removed. */
  private async clearStaleLock(): Promise<boolean> {
    try {
      const [content, stat] = await Promise.all([
        fs.promises.readFile(this.lockFile, 'utf8'),
        fs.promises.stat(this.lockFile),
      ])
      const pid = Number(content.trim())
      const old = Date.now() - stat.mtimeMs > this.staleLockMs
      if (old || (pid > 0 && !processAlive(pid))) {
        await fs.promises.rm(this.lockFile, { force: true })
        this.logger.warn({ lock: this.lockFile, pid }, 'removed stale fragment store lock')
        return true
      }
    } catch (err) {
      // Lock vanished between open and inspection; retry immediately.
      if (isErrno(err, 'ENOENT')) return true
      throw err
    }
    return false
  }
}

function processAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (err) {
    return isErrno(err, 'EPERM')
  }
}

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code
}
