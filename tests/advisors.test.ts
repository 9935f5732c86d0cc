import assert from 'node:assert/strict'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { test } from 'node:test'
import { resolveConfig } from '../src/config'
import { PlanError } from '../src/errors'
import { Completion, createCompletion } from '../src/engine/llm'
import { JsonPlanner, OpenAIPlanner, StaticPlanner, parseSteps } from '../src/engine/planner'
import { NoopRecoveryAdvisor, OpenAIRecoveryAdvisor, TableRecoveryAdvisor } from '../src/engine/recovery'
import { silentLogger } from '../src/logger'

const CTX = { url: 'https://shop.test/p/1', title: 'Product' }

function fixedCompletion(reply: string | Error) {
  const prompts: Array<{ system: string; user: string }> = []
  const complete: Completion = async (system, user) => {
    prompts.push({ system, user })
    if (reply instanceof Error) throw reply
    return reply
  }
  return { complete, prompts }
}

function tmpFile(name: string, contents?: string): string {
  const file = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'surefoot-plan-')), name)
  if (contents !== undefined) fs.writeFileSync(file, contents)
  return file
}

// ---------------------------------------------------------------------------
// Recovery advisors
// ---------------------------------------------------------------------------

test('table advisor offers synonyms, then the closest visible text', async () => {
  const advisor = new TableRecoveryAdvisor()
  const out = await advisor.suggestRecovery(
    'CLICK',
    'Add to cart',
    'CLICK "Add to cart" had no observable effect',
    ['Add to bag', 'Checkout', 'Add to cart now'],
    CTX,
  )
  assert.deepEqual(out, [
    { alternativeTarget: 'Add to bag', description: 'synonym "add to bag" for "add to cart"' },
    { alternativeTarget: 'Add to bag', description: 'synonym "bag" for "cart"' },
    { alternativeTarget: 'Add to cart now', description: 'closest visible text (0.85)' },
  ])
})

test('table advisor suggests a wait for timing failures', async () => {
  const out = await new TableRecoveryAdvisor().suggestRecovery('CLICK', 'Pay now', 'could not resolve "Pay now" (best score 0.12)', ['Help'], CTX)
  assert.deepEqual(out, [{ waitTimeSeconds: 2, description: 'wait for late content' }])
})

test('table advisor never proposes the same text again', async () => {
  const out = await new TableRecoveryAdvisor().suggestRecovery('CLICK', 'Continue', 'CLICK "Continue" had no observable effect', ['Continue'], CTX)
  assert.deepEqual(out, [])
})

test('table advisor takes a custom synonym table', async () => {
  const advisor = new TableRecoveryAdvisor({ pay: ['settle'] }, 5)
  const out = await advisor.suggestRecovery('CLICK', 'Pay', 'timed out', ['Settle invoice'], CTX)
  assert.deepEqual(out, [
    { alternativeTarget: 'Settle invoice', description: 'synonym "settle" for "pay"' },
    { waitTimeSeconds: 5, description: 'wait for late content' },
  ])
})

test('noop advisor suggests nothing', async () => {
  assert.deepEqual(await new NoopRecoveryAdvisor().suggestRecovery(), [])
})

test('model advisor maps strategies to suggestions', async () => {
  const { complete, prompts } = fixedCompletion(JSON.stringify({
    strategies: [
      { description: 'use the bag button', alternative_target: 'Add to bag', wait_time: null },
      { description: 'wait for the price widget', wait_time: '3' },
    ],
  }))
  const advisor = new OpenAIRecoveryAdvisor(complete, silentLogger())
  const out = await advisor.suggestRecovery('CLICK', 'Add to cart', 'no effect', ['Add to bag', ''], CTX)

  assert.deepEqual(out, [
    { alternativeTarget: 'Add to bag', waitTimeSeconds: undefined, description: 'use the bag button' },
    { alternativeTarget: undefined, waitTimeSeconds: 3, description: 'wait for the price widget' },
  ])
  assert.equal(prompts.length, 1)
  const lines = prompts[0].user.split('\n')
  assert.equal(lines[0], 'Failed action: CLICK')
  assert.equal(lines[1], 'Target element: "Add to cart"')
  assert.equal(lines[3], 'Page: Product (https://shop.test/p/1)')
  assert.equal(lines[5], '- Add to bag')
  assert.equal(lines[6], '')
})

test('model advisor returns nothing on bad output or failure', async () => {
  const logger = silentLogger()
  const garbled = new OpenAIRecoveryAdvisor(fixedCompletion('not json').complete, logger)
  const failing = new OpenAIRecoveryAdvisor(fixedCompletion(new Error('rate limited')).complete, logger)
  const invalid = new OpenAIRecoveryAdvisor(fixedCompletion('{"strategies":[{"wait_time":-1}]}').complete, logger)

  assert.deepEqual(await garbled.suggestRecovery('CLICK', 'x', 'e', [], CTX), [])
  assert.deepEqual(await failing.suggestRecovery('CLICK', 'x', 'e', [], CTX), [])
  assert.deepEqual(await invalid.suggestRecovery('CLICK', 'x', 'e', [], CTX), [])
})

// ---------------------------------------------------------------------------
// Planners
// ---------------------------------------------------------------------------

test('parseSteps normalizes actions and values', () => {
  const steps = parseSteps([
    { action: ' click ', target: 'Buy', value: null, region: null },
    { action: 'type', target: 'Quantity', value: 3 },
  ])
  assert.equal(steps.length, 2)
  assert.equal(steps[0].action, 'CLICK')
  assert.equal(steps[0].value, undefined)
  assert.equal(steps[0].region, undefined)
  assert.equal(steps[1].action, 'TYPE')
  assert.equal(steps[1].value, '3')
})

test('parseSteps accepts a steps wrapper', () => {
  const steps = parseSteps({ steps: [{ action: 'WAIT', target: '2' }] })
  assert.deepEqual(steps.map((s) => [s.action, s.target]), [['WAIT', '2']])
})

test('parseSteps names the first bad field', () => {
  assert.throws(
    () => parseSteps([{ action: 'CLICK', target: 'ok' }, { action: 'JUMP', target: 'x' }]),
    (err: unknown) => err instanceof PlanError && err.kind === 'plan' && /^invalid plan at 1\.action: Invalid enum value/.test(err.message),
  )
  assert.throws(() => parseSteps({ steps: 'x' }), { message: 'invalid plan at <root>: Expected array, received string' })
  assert.throws(() => parseSteps([{ action: 'CLICK' }]), { message: 'invalid plan at 0.target: Required' })
})

test('static planner hands out copies', async () => {
  const planner = new StaticPlanner([{ action: 'CLICK', target: 'Buy' }])
  const first = await planner.plan()
  first[0].target = 'changed'
  assert.equal((await planner.plan())[0].target, 'Buy')
})

test('json planner reads arrays and wrapped plans', async () => {
  const file = tmpFile('plan.json', JSON.stringify({ steps: [{ action: 'navigate', target: 'https://shop.test/' }] }))
  assert.deepEqual((await new JsonPlanner(file).plan()).map((s) => [s.action, s.target]), [['NAVIGATE', 'https://shop.test/']])
})

test('json planner reports unreadable and malformed files', async () => {
  const missing = tmpFile('missing.json')
  await assert.rejects(new JsonPlanner(missing).plan(), (err: unknown) =>
    err instanceof PlanError && err.message.startsWith(`cannot read plan ${missing}: ENOENT`))

  const broken = tmpFile('broken.json', '[{"action":')
  await assert.rejects(new JsonPlanner(broken).plan(), { message: `plan ${broken} is not valid JSON` })
})

test('model planner sends the instruction and validates the reply', async () => {
  const { complete, prompts } = fixedCompletion('{"steps":[{"action":"navigate","target":"https://shop.test/"},{"action":"click","target":"TVs"}]}')
  const steps = await new OpenAIPlanner(complete).plan('open the TV category')

  assert.deepEqual(steps.map((s) => [s.action, s.target]), [['NAVIGATE', 'https://shop.test/'], ['CLICK', 'TVs']])
  assert.equal(prompts[0].user, 'open the TV category')
  assert.match(prompts[0].system, /NAVIGATE/)
})

test('model planner rejects malformed replies', async () => {
  await assert.rejects(new OpenAIPlanner(fixedCompletion('steps: none').complete).plan('x'), {
    name: 'PlanError',
    message: 'planner returned malformed JSON',
  })
  await assert.rejects(new OpenAIPlanner(fixedCompletion('{"steps":[{"action":"FLY","target":"x"}]}').complete).plan('x'), PlanError)
})

test('createCompletion needs an API key', () => {
  const dataDir = os.tmpdir()
  assert.equal(createCompletion(resolveConfig({ dataDir }, {})), null)
  assert.equal(typeof createCompletion(resolveConfig({ dataDir, openaiApiKey: 'test-secret' }, {})), 'function')
})
