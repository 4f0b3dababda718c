import { AsyncLocalStorage } from "node:async_hooks"
import { RootsLoadContext } from "../../adapters/load-context/roots-load-context"
import type { LoadContext } from "../../ports/load-context"

const storage = new AsyncLocalStorage<LoadContext>()

/**
 * Run `fn` with `context` as the ambient load context. Async work started
 * inside `fn` keeps seeing it; other concurrent work does not.
 */
export function runWithLoadContext<T>(context: LoadContext, fn: () => T): T {
  return storage.run(context, fn)
}

/**
 * The ambient load context of the caller: the innermost `runWithLoadContext`
 * scope, or the process working directory outside of any scope.
 */
export function currentLoadContext(): LoadContext {
  return storage.getStore() ?? new RootsLoadContext({ name: "cwd", roots: [process.cwd()] })
}
