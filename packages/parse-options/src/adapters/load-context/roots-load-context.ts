import fs from "node:fs"
import path from "node:path"
import type { LoadContext } from "../../ports/load-context"

export type RootsLoadContextOptions = {
  /** @default "roots" */
  name?: string

  /**
   * Directories searched in order. Relative roots resolve against `cwd`.
   */
  roots: readonly string[]

  /** @default process.cwd() */
  cwd?: string
}

/**
 * Finds resources in the first root directory that contains them. Only
 * regular files inside a root are returned.
 */
export class RootsLoadContext implements LoadContext {
  readonly name: string
  private readonly roots: readonly string[]

  constructor(opts: RootsLoadContextOptions) {
    const cwd = opts.cwd ?? process.cwd()

    this.name = opts.name ?? "roots"
    this.roots = opts.roots.map((root) => path.resolve(cwd, root))
  }

  resolve(resource: string): string | undefined {
    // resource names are root-relative, like classpath entries
    const relative = resource.replace(/^\/+/, "")

    for (const root of this.roots) {
      const candidate = path.join(root, relative)
      const fromRoot = path.relative(root, candidate)
      const outside =
        fromRoot === ".." || fromRoot.startsWith(`..${path.sep}`) || path.isAbsolute(fromRoot)

      if (fromRoot === "" || outside) continue
      if (fs.statSync(candidate, { throwIfNoEntry: false })?.isFile()) return candidate
    }

    return undefined
  }
}
