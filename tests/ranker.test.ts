import assert from 'node:assert/strict'
import { test } from 'node:test'
import { silentLogger } from '../src/logger'
import { HistoryStore } from '../src/ranking/history'
import {
  CandidateRanker,
  RankedCandidate,
  acceptedAt,
  exactSignal,
  structuralSignal,
  substringSignal,
} from '../src/ranking/ranker'
import { inferRegion, regionFromHint } from '../src/ranking/regions'
import { STRATEGIES, effectiveWeights } from '../src/ranking/weights'
import type { ElementCandidate } from '../src/snapshot/types'
import { candidate, offlineScorer } from './support/candidates'

const production = () => new CandidateRanker(STRATEGIES.production, offlineScorer())
const fused = () => new CandidateRanker(STRATEGIES.fused, offlineScorer())

function ranked(scores: number[]): RankedCandidate<ElementCandidate>[] {
  return scores.map((score, i) => ({ score, candidate: candidate({ text: `c${i}` }, i), signals: {} }))
}

test('an exact button match scores every applicable signal', async () => {
  const [best] = await production().rank('Add to cart', [candidate({ text: 'Add to Cart' })], 'CLICK')
  assert.equal(best.score, 0.96)
  assert.deepEqual(best.signals, {
    exact: 1,
    substring: 1,
    keyword: 1,
    semantic: 1,
    structural: 1,
    attribute: 0,
    visibility: 1,
    position: 1,
    region: 0,
  })
})

test('a verbatim substring match clears the standard threshold', async () => {
  const ranker = production()
  const pool = [
    candidate({ text: 'Cart' }, 0),
    candidate({ text: 'Add to cart - free delivery' }, 1),
    candidate({ text: 'Add a note' }, 2),
  ]
  const { best, ranked: order } = await ranker.bestMatch('add to cart', pool, 'CLICK')
  assert.equal(order[0].candidate.text, 'Add to cart - free delivery')
  assert.ok(order[0].score >= 0.75)
  assert.equal(order[0].signals.substring, 1)
  assert.equal(best?.candidate.text, 'Add to cart - free delivery')
})

test('target text found only in ancestor text still dominates', async () => {
  const pool = [
    candidate({ text: '', ancestorText: 'LG 1.5 Ton Split AC Add to cart ₹35,990' }, 0),
    candidate({ text: 'Compare' }, 1),
  ]
  const { best, ranked: order } = await production().bestMatch('Add to cart', pool, 'CLICK')
  assert.equal(order[0].candidate.index, 0)
  assert.ok(order[0].score >= 0.75)
  assert.equal(order[0].signals.exact, 0)
  assert.equal(order[0].signals.substring, 1)
  assert.equal(order[0].signals.keyword, 1)
  assert.equal(best?.candidate.index, 0)
})

test('two shared significant words give a partial substring signal', () => {
  assert.equal(substringSignal('split air conditioner', candidate({ text: 'Split conditioner 1.5 ton' })), 0.7)
  assert.equal(substringSignal('split air conditioner', candidate({ text: 'Split system' })), 0)
  assert.equal(exactSignal('', candidate({ text: '' })), 0)
})

test('ties keep document order', async () => {
  const pool = [candidate({ text: 'Buy' }, 0), candidate({ text: 'Buy' }, 1)]
  const order = await production().rank('Buy', pool, 'CLICK')
  assert.deepEqual(order.map((r) => r.candidate.index), [0, 1])
})

test('a region hint lifts the candidate in that region', async () => {
  const pool = [
    candidate({ text: 'Login', box: { x: 400, y: 300, width: 80, height: 20 } }, 0),
    candidate({ text: 'Login', box: { x: 400, y: 50, width: 80, height: 20 } }, 1),
  ]
  const order = await production().rank('Login', pool, 'CLICK', { regionHint: 'top navigation' })
  assert.equal(order[0].candidate.index, 1)
  assert.equal(order[0].signals.region, 1)
  assert.equal(order[1].signals.region, 0)
})

test('thresholds follow target length and strategy', () => {
  assert.equal(production().thresholdFor('Add to cart', 'CLICK'), 0.65)
  assert.equal(production().thresholdFor('x'.repeat(61), 'CLICK'), 0.35)
  assert.equal(production().thresholdFor('x'.repeat(60), 'CLICK'), 0.65)
  assert.equal(fused().thresholdFor('Email', 'TYPE'), 0.3)
  assert.equal(fused().thresholdFor('Email', 'SELECT'), 0.3)
  assert.equal(fused().thresholdFor('Email', 'CLICK'), 0.38)
})

test('the floor only applies to long targets or small pools', () => {
  const ranker = production()
  assert.equal(ranker.accept('Add to cart', ranked([0.5, 0.1, 0.1, 0.1, 0.1, 0.1]), 'CLICK'), null)
  assert.equal(ranker.accept('Add to cart', ranked([0.5, 0.1, 0.1, 0.1, 0.1]), 'CLICK')?.score, 0.5)
  assert.equal(ranker.accept('Add to cart', ranked([0.39, 0.1]), 'CLICK'), null)
  assert.equal(ranker.accept('Add to cart', [], 'CLICK'), null)
})

test('long product titles are accepted at the relaxed tier', () => {
  const title = 'Samsung 183 L 4 Star Inverter Direct Cool Single Door Refrigerator with Base Drawer'
  const pool = ranked([0.42, 0.3, 0.2, 0.1, 0.1, 0.1, 0.1])
  assert.equal(production().accept(title, pool, 'CLICK')?.score, 0.42)
})

test('a long target accepts a ranked title below the standard threshold', async () => {
  const ranker = production()
  const target = 'LG 1.5 Ton 5 Star AI DUAL Inverter Split AC with Copper Condenser'
  const title = 'LG 1.5 Ton 5 Star AI DUAL Inverter Split AC (Copper, 4 Way Swing, 2024 Model)'
  const pool = [
    ...['Home', 'Support', 'Cart', 'Login', 'Offers'].map((text, i) => candidate({ text }, i)),
    candidate({ tag: 'div', text: title }, 5),
  ]
  const { best, ranked: order } = await ranker.bestMatch(target, pool, 'CLICK')

  assert.equal(order[0].candidate.text, title)
  assert.equal(order[0].signals.substring, 0.7)
  assert.ok(order[0].score >= 0.35 && order[0].score < 0.65)
  assert.equal(ranker.thresholdFor(target, 'CLICK'), 0.35)
  assert.equal(best?.candidate.text, title)
  assert.equal(ranker.accept('Split AC', order, 'CLICK'), null)
})

test('the fused strategy uses a small-pool floor', () => {
  assert.equal(fused().accept('Go', ranked([0.3, 0.1]), 'CLICK')?.score, 0.3)
  assert.equal(fused().accept('Go', ranked([0.3, 0, 0, 0, 0, 0]), 'CLICK'), null)
  assert.equal(fused().accept('Go', ranked([0.2]), 'CLICK'), null)
})

test('raising the threshold never accepts more candidates', () => {
  const pool = ranked([0.9, 0.7, 0.5, 0.3, 0.1])
  let previous = Infinity
  for (const t of [0, 0.2, 0.4, 0.6, 0.8, 1]) {
    const n = acceptedAt(pool, t).length
    assert.ok(n <= previous)
    previous = n
  }
  assert.equal(acceptedAt(pool, 0.5).length, 3)
})

test('fused weights renormalize without a screen-reading pass', async () => {
  const weights = effectiveWeights(STRATEGIES.fused, false)
  assert.equal(weights.vision, undefined)
  assert.equal(effectiveWeights(STRATEGIES.fused, true).vision, 0.15)

  const [best] = await fused().rank('Checkout', [candidate({ text: 'Checkout' })], 'CLICK')
  assert.equal(best.score, 1)
  assert.deepEqual(Object.keys(best.signals).sort(), ['semantic', 'substring'])
})

test('history adds a bonus after a recorded success', async () => {
  const history = new HistoryStore(silentLogger())
  const ranker = new CandidateRanker(STRATEGIES.production, offlineScorer(), history)
  const pool = [candidate({ text: 'Sign in', attributes: { id: 'login' } })]

  const [before] = await ranker.rank('Log in', pool, 'CLICK')
  ranker.recordSuccess('CLICK', pool[0])
  const [after] = await ranker.rank('Log in', pool, 'CLICK')
  assert.ok(Math.abs(after.score - before.score - 0.05) < 0.001)
  assert.equal(history.has('CLICK', 'button_sign in_login'), true)
  assert.equal(history.has('TYPE', 'button_sign in_login'), false)
})

test('structural signal depends on the action', () => {
  assert.equal(structuralSignal('TYPE', candidate({ tag: 'input', attributes: { type: 'email' } })), 1)
  assert.equal(structuralSignal('TYPE', candidate({ tag: 'input', attributes: { type: 'radio' } })), 0)
  assert.equal(structuralSignal('SELECT', candidate({ tag: 'select' })), 1)
  assert.equal(structuralSignal('CLICK', candidate({ tag: 'div' })), 0)
  assert.equal(structuralSignal('CLICK', candidate({ tag: 'div', kind: 'product_card' })), 1)
  assert.equal(structuralSignal('WAIT', candidate({ tag: 'button' })), 0)
})

test('regions come from product markers, then the box', () => {
  assert.equal(inferRegion(candidate({ kind: 'product_card' })), 'product_grid')
  assert.equal(inferRegion(candidate({ attributes: { className: 'ProductTile' } })), 'product_grid')
  assert.equal(inferRegion(candidate({ box: { x: 500, y: 120, width: 10, height: 10 } })), 'header')
  assert.equal(inferRegion(candidate({ box: { x: 100, y: 500, width: 10, height: 10 } })), 'sidebar')
  assert.equal(inferRegion(candidate({ box: null })), 'main')
  assert.equal(regionFromHint('left filters'), 'sidebar')
  assert.equal(regionFromHint('search results'), 'product_grid')
  assert.equal(regionFromHint('footer'), null)
  assert.equal(regionFromHint(undefined), null)
})
