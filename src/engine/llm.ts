import OpenAI from 'openai'
import type { EngineConfig } from '../config'

/** One JSON-object chat turn: system prompt and user prompt in, raw JSON text out. */
export type Completion = (system: string, user: string) => Promise<string>

export function openAICompletion(client: OpenAI, model: string): Completion {
  return async (system, user) => {
    const res = await client.chat.completions.create({
      model,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: user },
      ],
      temperature: 0.2,
      response_format: { type: 'json_object' },
    })
    return res.choices[0]?.message?.content?.trim() ?? '{}'
  }
}

/** Null without an API key; callers fall back to the offline adapters. */
export function createCompletion(config: EngineConfig): Completion | null {
  if (!config.openaiApiKey) return null
  return openAICompletion(new OpenAI({ apiKey: config.openaiApiKey }), config.chatModel)
}

/** One image turn: instruction and a PNG screenshot in, raw JSON text out. */
export type ImageCompletion = (prompt: string, png: Buffer) => Promise<string>

export function openAIImageCompletion(client: OpenAI, model: string): ImageCompletion {
  return async (prompt, png) => {
    const res = await client.chat.completions.create({
      model,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: prompt },
            { type: 'image_url', image_url: { url: `data:image/png;base64,${png.toString('base64')}` } },
          ],
        },
      ],
      temperature: 0,
      response_format: { type: 'json_object' },
    })
    return res.choices[0]?.message?.content?.trim() ?? '{}'
  }
}

/** Null unless the screen-reading pass is switched on and an API key is set. */
export function createImageCompletion(config: EngineConfig): ImageCompletion | null {
  if (!config.visionEnabled || !config.openaiApiKey) return null
  return openAIImageCompletion(new OpenAI({ apiKey: config.openaiApiKey }), config.chatModel)
}
