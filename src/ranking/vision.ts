import { z } from 'zod'
import type { PageDriver } from '../driver/types'
import type { ImageCompletion } from '../engine/llm'
import type { Logger } from '../logger'

/** Reads visible texts off the rendered page, for the vision signal. */
export interface ScreenReader {
  read(page: PageDriver): Promise<string[]>
}

const ReadingSchema = z.object({ texts: z.array(z.string()).default([]) })

const READ_PROMPT = `List the visible text of every button, link, field label and product title on this screenshot.
Reply with {"texts":["..."]}.`

/** Screenshot in, texts out. A failed read is an empty list. */
export class ModelScreenReader implements ScreenReader {
  constructor(
    private readonly complete: ImageCompletion,
    private readonly logger: Logger,
    private readonly maxTexts = 200,
  ) {}

  async read(page: PageDriver): Promise<string[]> {
    try {
      const raw = await this.complete(READ_PROMPT, await page.screenshot())
      const { texts } = ReadingSchema.parse(JSON.parse(raw))
      return texts.map((t) => t.trim()).filter(Boolean).slice(0, this.maxTexts)
    } catch (err) {
      this.logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'screen reading failed')
      return []
    }
  }
}
