import { BaseIncluder } from "../../core/includers/base-includer"
import type { IncludeContext } from "../../ports/include-context"
import type { IncludedValue, IncludeResult } from "../../ports/includer"

/**
 * Serves includes from documents held in memory, keyed by name. A name is
 * looked up as written first, then relative to the including source.
 */
export class ObjectIncluder extends BaseIncluder {
  private readonly documents: ReadonlyMap<string, IncludedValue>

  constructor(documents: Readonly<Record<string, IncludedValue>>, name = "object") {
    super(name)
    this.documents = new Map(Object.entries(documents))
  }

  include(context: IncludeContext, what: string): IncludeResult {
    const direct = this.documents.get(what)
    if (direct) return this.included(direct)

    const relative = context.relativeTo(what)
    const nested = relative === undefined ? undefined : this.documents.get(relative)
    if (nested) return this.included(nested)

    return this.deferred()
  }
}
