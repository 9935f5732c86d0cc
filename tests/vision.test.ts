import assert from 'node:assert/strict'
import { test } from 'node:test'
import { defaultRegistry } from '../src/components/registry'
import type { PageDriver } from '../src/driver/types'
import type { ImageCompletion } from '../src/engine/llm'
import { silentLogger } from '../src/logger'
import { CandidateRanker } from '../src/ranking/ranker'
import { ModelScreenReader, ScreenReader } from '../src/ranking/vision'
import { RankingStrategy, STRATEGIES } from '../src/ranking/weights'
import { ElementLocator } from '../src/resolution/locator'
import { SelfHealingResolver } from '../src/resolution/self-healing'
import { SnapshotExtractor } from '../src/snapshot/extractor'
import { offlineScorer } from './support/candidates'
import { FakePage, html } from './support/fake-page'

const logger = silentLogger()

class CountingReader implements ScreenReader {
  calls = 0
  constructor(private readonly texts: string[]) {}
  async read(_page: PageDriver): Promise<string[]> {
    this.calls++
    return this.texts
  }
}

function locatorWith(strategy: RankingStrategy, reader: ScreenReader): ElementLocator {
  return new ElementLocator(
    new SnapshotExtractor(logger, { settleMs: 0 }),
    defaultRegistry(logger),
    new CandidateRanker(strategy, offlineScorer()),
    new SelfHealingResolver(logger),
    logger,
    3,
    reader,
  )
}

async function checkoutPage(): Promise<FakePage> {
  const page = new FakePage({ routes: { 'https://shop.test/': html('Shop', '<div><button>Checkout</button></div>') } })
  await page.goto('https://shop.test/')
  return page
}

test('the screen reader sends the screenshot and keeps non-empty texts', async () => {
  const seen: { prompt: string; png: string }[] = []
  const complete: ImageCompletion = async (prompt, png) => {
    seen.push({ prompt, png: png.toString() })
    return '{"texts":[" Checkout ","","Cart"]}'
  }
  const texts = await new ModelScreenReader(complete, logger).read(await checkoutPage())

  assert.deepEqual(texts, ['Checkout', 'Cart'])
  assert.equal(seen.length, 1)
  assert.equal(seen[0].png, 'fake')
  assert.match(seen[0].prompt, /"texts"/)
})

test('an unreadable reply reads as no texts', async () => {
  const reader = new ModelScreenReader(async () => 'no json here', logger)
  assert.deepEqual(await reader.read(await checkoutPage()), [])

  const failing = new ModelScreenReader(async () => { throw new Error('rate limited') }, logger)
  assert.deepEqual(await failing.read(await checkoutPage()), [])
})

test('the fused ranker gets screen-read texts from the locator', async () => {
  const reader = new CountingReader(['Checkout'])
  const found = await locatorWith(STRATEGIES.fused, reader).locate(await checkoutPage(), { target: 'Checkout', action: 'CLICK', scan: 'clickable' })

  assert.equal(reader.calls, 1)
  assert.equal(found.ranked[0].signals.vision, 1)
  assert.equal(found.ranked[0].score, 1)
  assert.equal(found.attempts[0].descriptor.text, 'Checkout')
})

test('the screen is not read when the strategy ignores vision or texts are given', async () => {
  const reader = new CountingReader(['Checkout'])
  const production = await locatorWith(STRATEGIES.production, reader).locate(await checkoutPage(), { target: 'Checkout', action: 'CLICK', scan: 'clickable' })
  assert.equal(reader.calls, 0)
  assert.equal(production.ranked[0].signals.vision, undefined)

  const given = await locatorWith(STRATEGIES.fused, reader).locate(
    await checkoutPage(),
    { target: 'Checkout', action: 'CLICK', scan: 'clickable', rank: { visionTexts: ['Checkout now'] } },
  )
  assert.equal(reader.calls, 0)
  assert.equal(given.ranked[0].signals.vision, 1)
})
