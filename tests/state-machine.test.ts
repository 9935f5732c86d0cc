import assert from 'node:assert/strict'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { test } from 'node:test'
import { TraceLogger } from '../src/audit/logger'
import { resolveConfig } from '../src/config'
import { createEngine } from '../src/engine/factory'
import { JsonPlanner, Planner, StaticPlanner } from '../src/engine/planner'
import { NoopRecoveryAdvisor, RecoveryAdvisor, RecoverySuggestion, TableRecoveryAdvisor } from '../src/engine/recovery'
import { RunOptions, RunStateMachine } from '../src/engine/state-machine'
import type { ExecutionStep } from '../src/engine/types'
import { FragmentMatcher } from '../src/flow/fragment-matcher'
import { FragmentStore } from '../src/flow/fragment-store'
import { FlowOptimizer, Optimization } from '../src/flow/optimizer'
import { StateShortcutRegistry, UrlShortcut, UrlShortcutRegistry } from '../src/flow/shortcuts'
import { silentLogger } from '../src/logger'
import { SnapshotExtractor } from '../src/snapshot/extractor'
import { TIMEOUTS, makeLocator } from './support/engine'
import { FakePage, FakeSession, Routes, html } from './support/fake-page'

const logger = silentLogger()

const SHOP: Routes = {
  'https://shop.test/': html('Shop', [
    '<div><form action="/search"><input type="search" name="q" placeholder="Search products"></form></div>',
    '<div><a href="/tvs">TVs</a></div>',
    '<div><button>Noop</button></div>',
    '<div><button data-reveal="#deals">Deals</button></div>',
    '<div id="deals" hidden>Deals of the day</div>',
  ].join('')),
  'https://shop.test/search': html('Results', '<h1>Results</h1>'),
  'https://shop.test/tvs': html('TVs', '<div><a href="/p/lg-oled">LG OLED</a></div>'),
  'https://shop.test/p/lg-oled': html('LG OLED', [
    '<div><button data-reveal="#added">Add to cart</button></div>',
    '<div id="added" hidden>Added</div>',
  ].join('')),
}

interface Setup {
  page?: FakePage
  session?: FakeSession
  planner?: Planner
  advisor?: RecoveryAdvisor
  store?: FragmentStore
  urlShortcuts?: UrlShortcut[]
  trace?: TraceLogger
  optimizer?: FlowOptimizer
}

function machine(setup: Setup = {}, opts: RunOptions = {}) {
  const page = setup.page ?? new FakePage({ routes: SHOP })
  const session = setup.session ?? new FakeSession(page)
  const optimizer = setup.optimizer ?? new FlowOptimizer(
    logger,
    setup.store ? new FragmentMatcher(setup.store) : null,
    new UrlShortcutRegistry(setup.urlShortcuts ?? []),
    new StateShortcutRegistry([]),
  )
  const sm = new RunStateMachine(
    {
      session,
      planner: setup.planner ?? new StaticPlanner([]),
      locator: makeLocator(),
      extractor: new SnapshotExtractor(logger, { settleMs: 0 }),
      advisor: setup.advisor ?? new NoopRecoveryAdvisor(),
      logger,
      optimizer,
      store: setup.store ?? null,
      trace: setup.trace ?? null,
    },
    { ...TIMEOUTS, ...opts },
  )
  return { sm, page, session }
}

function tmpStore(): FragmentStore {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'surefoot-run-'))
  return new FragmentStore(path.join(dir, 'fragments.json'), logger)
}

const nav = (target = 'https://shop.test/'): ExecutionStep => ({ action: 'NAVIGATE', target })
const click = (target: string): ExecutionStep => ({ action: 'CLICK', target })

test('a search run executes every step with sound transitions', async () => {
  const { sm, page, session } = machine()
  const report = await sm.run([nav(), { action: 'TYPE', target: 'search', value: 'lg tv 108cm' }])

  assert.equal(report.success, true)
  assert.equal(report.error, null)
  assert.equal(report.steps_executed, 2)
  assert.equal(report.total_steps, 2)
  assert.equal(report.skipped_steps, 0)
  assert.deepEqual(report.results.map((r) => r.via), ['navigate', 'search'])
  assert.equal(page.url(), 'https://shop.test/search?q=lg+tv+108cm')
  assert.deepEqual(report.state_transitions, [
    { from: 'about:blank', to: 'https://shop.test/', action: 'NAVIGATE', changed: true },
    { from: 'https://shop.test/', to: 'https://shop.test/search?q=lg+tv+108cm', action: 'TYPE', changed: true },
  ])
  assert.deepEqual(report.trace.map((t) => t.to), ['PLAN', 'EXECUTE', 'VALIDATE', 'EXECUTE', 'VALIDATE', 'CLEANUP', 'DONE'])
  assert.equal(report.trace[0].from, 'INITIALIZE')
  assert.equal(session.acquired, 1)
  assert.equal(session.released, 1)
})

test('a recorded chain is replayed on the next run', async () => {
  const store = tmpStore()
  const first = await machine({ store }).sm.run([nav(), click('TVs'), click('LG OLED')])
  assert.equal(first.success, true)
  assert.equal(first.fragments_saved, 2)

  const { sm, page } = machine({ store })
  const second = await sm.run([nav(), click('TVs'), click('LG OLED'), click('Add to cart')])
  assert.equal(second.success, true)
  assert.equal(second.steps_executed, 4)
  assert.equal(second.skipped_steps, 3)
  assert.equal(second.fragment_reuse_count, 1)
  assert.equal(second.shortcut_count, 0)
  assert.deepEqual(second.results.map((r) => [r.stepIndex, r.via, r.skipped]), [[0, 'fragment', 3], [3, 'click', 1]])
  assert.deepEqual(page.visits, ['https://shop.test/p/lg-oled'])
  assert.deepEqual(page.clicks, ['Add to cart'])
  assert.equal(second.fragments_saved, 2)

  const stored = await store.all()
  assert.deepEqual(stored.map((f) => [f.steps.length, f.success_count]), [[2, 1], [3, 2], [4, 1]])
})

test('a click without effect fails the run when no recovery is allowed', async () => {
  const { sm } = machine({}, { maxRecoveryAttempts: 0 })
  const report = await sm.run([nav(), click('Noop')])

  assert.equal(report.success, false)
  assert.equal(report.steps_executed, 1)
  assert.equal(report.error, 'exhausted recovery (0 attempts) at step 1: CLICK "Noop" had no observable effect')
  assert.equal(report.results[1].errorKind, 'validation')
  assert.equal(report.trace.some((t) => t.to === 'RECOVER'), false)
})

test('recovery retries until the attempt budget is spent', async () => {
  const { sm } = machine({}, { maxRecoveryAttempts: 1 })
  const report = await sm.run([nav(), click('Noop'), click('TVs')])

  assert.equal(report.success, false)
  assert.ok(report.steps_executed < report.total_steps)
  assert.match(report.error ?? '', /^exhausted recovery \(1 attempts\) at step 1: /)
  assert.equal(report.results.length, 2)
  assert.equal(report.results[1].attempts, 2)
  assert.equal(report.trace.filter((t) => t.to === 'RECOVER').length, 1)
})

test('an advisor suggestion replaces the failing target', async () => {
  const page = new FakePage({
    routes: {
      'https://shop.test/': html('Shop', [
        '<div><button data-reveal="#added">Add to bag</button></div>',
        '<div id="added" hidden>Added</div>',
      ].join('')),
    },
  })
  const { sm } = machine({ page, advisor: new TableRecoveryAdvisor() })
  const report = await sm.run([nav(), click('Add to cart')])

  assert.equal(report.success, true)
  assert.equal(report.steps[1].target, 'Add to bag')
  assert.equal(report.results[1].attempts, 2)
  assert.equal(report.results[1].success, true)
  assert.equal(report.trace.filter((t) => t.to === 'RECOVER').length, 1)
})

class ClosingPage extends FakePage {
  async waitForTimeout(ms: number): Promise<void> {
    if (ms >= 1000) throw new Error('Target page, context or browser has been closed')
    await super.waitForTimeout(ms)
  }
}

test('a recovery wait on a closed page still yields a report', async () => {
  const page = new ClosingPage({ routes: { 'https://shop.test/': html('Shop', '<div><button>Noop</button></div>') } })
  const { sm, session } = machine({ page, advisor: new TableRecoveryAdvisor() }, { maxRecoveryAttempts: 2 })
  const report = await sm.run([nav(), click('Missing widget zz')])

  assert.equal(report.success, false)
  assert.match(report.error ?? '', /^exhausted recovery \(2 attempts\) at step 1: could not resolve "Missing widget zz"/)
  assert.equal(report.trace.filter((t) => t.to === 'RECOVER').length, 2)
  assert.deepEqual(report.trace.slice(-2).map((t) => t.to), ['CLEANUP', 'DONE'])
  assert.equal(session.released, 1)
})

test('an advisor that throws synchronously counts as no suggestion', async () => {
  const advisor: RecoveryAdvisor = {
    suggestRecovery(): Promise<RecoverySuggestion[]> {
      throw new Error('advisor exploded')
    },
  }
  const { sm, session } = machine({ advisor }, { maxRecoveryAttempts: 1 })
  const report = await sm.run([nav(), click('Noop')])

  assert.equal(report.success, false)
  assert.equal(report.error, 'exhausted recovery (1 attempts) at step 1: CLICK "Noop" had no observable effect')
  assert.equal(session.released, 1)
})

class ExplodingOptimizer extends FlowOptimizer {
  async optimize(): Promise<Optimization | null> {
    throw new Error('optimizer exploded')
  }
}

test('an unexpected fault inside a phase becomes the report error', async () => {
  const optimizer = new ExplodingOptimizer(logger, null, new UrlShortcutRegistry([]), new StateShortcutRegistry([]))
  const { sm, session } = machine({ optimizer })
  const report = await sm.run([nav(), click('TVs')])

  assert.equal(report.success, false)
  assert.equal(report.error, 'run aborted at step 0: optimizer exploded')
  assert.equal(report.steps_executed, 0)
  assert.deepEqual(report.trace.slice(-2).map((t) => t.to), ['CLEANUP', 'DONE'])
  assert.equal(session.released, 1)
})

test('a failed navigation ends the run without recovery', async () => {
  const { sm } = machine()
  const report = await sm.run([nav('https://nowhere.test/'), click('TVs')])

  assert.equal(report.success, false)
  assert.equal(report.steps_executed, 0)
  assert.equal(report.error, 'navigation to https://nowhere.test/ failed: net::ERR_NAME_NOT_RESOLVED at https://nowhere.test/')
  assert.equal(report.trace.some((t) => t.to === 'RECOVER'), false)
})

test('a session that cannot start is reported', async () => {
  const page = new FakePage()
  const session = new FakeSession(page, 'no browser available')
  const report = await machine({ page, session }).sm.run([nav()])

  assert.equal(report.success, false)
  assert.equal(report.error, 'browser session could not start: no browser available')
  assert.equal(report.total_steps, 0)
  assert.deepEqual(report.trace.map((t) => t.to), ['CLEANUP', 'DONE'])
  assert.equal(session.released, 0)
})

test('an invalid plan is reported and the session released', async () => {
  const file = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'surefoot-plan-')), 'plan.json')
  fs.writeFileSync(file, JSON.stringify([{ action: 'JUMP', target: 'x' }]))
  const { sm, session } = machine({ planner: new JsonPlanner(file) })
  const report = await sm.run('jump around')

  assert.equal(report.success, false)
  assert.match(report.error ?? '', /^invalid plan at 0\.action: /)
  assert.equal(session.released, 1)
})

test('an empty plan succeeds trivially', async () => {
  const report = await machine().sm.run([])
  assert.equal(report.success, true)
  assert.equal(report.total_steps, 0)
  assert.equal(report.steps_executed, 0)
})

test('a URL shortcut replaces a click', async () => {
  const page = new FakePage({ routes: { ...SHOP, 'https://shop.test/deals/': html('Deals', '<h1>Deals</h1>') } })
  const { sm } = machine({ page, urlShortcuts: [{ phrase: 'deals', path: '/deals/' }] })
  const report = await sm.run([nav(), click('Deals')])

  assert.equal(report.success, true)
  assert.equal(report.shortcut_count, 1)
  assert.equal(report.skipped_steps, 1)
  assert.equal(report.results[1].via, 'url_shortcut')
  assert.equal(page.url(), 'https://shop.test/deals/')
  assert.deepEqual(page.clicks, [])
})

test('a shortcut that cannot load falls back to the click', async () => {
  const { sm, page } = machine({ urlShortcuts: [{ phrase: 'deals', path: '/deals/' }] })
  const report = await sm.run([nav(), click('Deals')])

  assert.equal(report.success, true)
  assert.equal(report.shortcut_count, 0)
  assert.equal(report.results[1].via, 'click')
  assert.deepEqual(page.clicks, ['Deals'])
})

test('a shortcut landing on an error page falls back to the click', async () => {
  const page = new FakePage({
    routes: { ...SHOP, 'https://shop.test/deals/': html('404 Not Found', '<h1>404 - Page not found</h1>') },
  })
  const { sm } = machine({ page, urlShortcuts: [{ phrase: 'deals', path: '/deals/' }] })
  const report = await sm.run([nav(), click('Deals')])

  assert.equal(report.success, true)
  assert.equal(report.shortcut_count, 0)
  assert.equal(report.skipped_steps, 0)
  assert.equal(report.results[1].via, 'click')
  assert.deepEqual(page.clicks, ['Deals'])
  assert.deepEqual(page.visits, ['https://shop.test/', 'https://shop.test/deals/', 'https://shop.test/'])
  assert.equal(page.url(), 'https://shop.test/')
})

test('runs write action and run entries to the trace', async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'surefoot-trace-'))
  const trace = new TraceLogger(dir)
  await machine({ trace }).sm.run([nav(), click('TVs')])
  await trace.close()

  const entries = trace.tail(undefined, 10)
  assert.deepEqual(entries.map((e) => e.type), ['action', 'action', 'run'])
  assert.equal(new Set(entries.map((e) => e.run_id)).size, 1)
  assert.equal(entries[2].result?.steps_executed, 2)
})

test('createEngine wires a runnable engine from config', async () => {
  const dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'surefoot-engine-'))
  const config = resolveConfig({ dataDir, maxRecoveryAttempts: 0 }, {})
  const page = new FakePage({ routes: SHOP })
  const engine = createEngine(config, logger, { session: new FakeSession(page), embedder: null })

  const report = await engine.run([nav(), click('TVs'), click('LG OLED')])
  await engine.close()

  assert.equal(report.success, true)
  assert.equal(report.fragments_saved, 2)
  assert.equal((await engine.store?.all())?.length, 2)
  assert.equal(fs.readdirSync(path.join(dataDir, 'traces')).length, 1)
})
