import type { PageDriver } from '../driver/types'
import type { Logger } from '../logger'
import {
  DEFAULT_LIMITS,
  ExtractorLimits,
  buttons,
  checkboxes,
  formInputs,
  modals,
  navItems,
  productCards,
  radioOptions,
} from './extractors'
import type { ComponentExtractor, ComponentKind, SemanticComponent } from './types'

/**
 * Kind → extractor lookup. Adding a kind means registering an extractor;
 * callers only ever ask for kinds by name.
 */
export class ComponentRegistry {
  private readonly extractors = new Map<ComponentKind, ComponentExtractor>()

  constructor(private readonly logger: Logger) {}

  register(kind: ComponentKind, extractor: ComponentExtractor): this {
    this.extractors.set(kind, extractor)
    return this
  }

  has(kind: ComponentKind): boolean {
    return this.extractors.has(kind)
  }

  kinds(): ComponentKind[] {
    return [...this.extractors.keys()]
  }

  async extract(page: PageDriver, kind: ComponentKind): Promise<SemanticComponent[]> {
    const extractor = this.extractors.get(kind)
    if (!extractor) throw new Error(`No extractor registered for component kind "${kind}"`)
    return extractor(page)
  }

  /** Runs every requested extractor; one failing kind yields an empty list, not an error. */
  async classify(page: PageDriver, kinds: ComponentKind[] = this.kinds()): Promise<Map<ComponentKind, SemanticComponent[]>> {
    const out = new Map<ComponentKind, SemanticComponent[]>()
    for (const kind of kinds) {
      try {
        out.set(kind, await this.extract(page, kind))
      } catch (err) {
        this.logger.warn({ kind, err: err instanceof Error ? err.message : String(err) }, 'component extraction failed')
        out.set(kind, [])
      }
    }
    return out
  }
}

export function defaultRegistry(logger: Logger, limits: Partial<ExtractorLimits> = {}): ComponentRegistry {
  const l: ExtractorLimits = { ...DEFAULT_LIMITS, ...limits }
  return new ComponentRegistry(logger)
    .register('product_card', productCards(logger, l))
    .register('form_input', formInputs(logger, l))
    .register('radio_option', radioOptions(logger, l))
    .register('checkbox', checkboxes(logger, l))
    .register('nav_item', navItems(logger, l))
    .register('button', buttons(logger, l))
    .register('modal', modals(logger, l))
}
