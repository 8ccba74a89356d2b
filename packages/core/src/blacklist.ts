import type { PatternSet } from './patterns.js'

/**
 * Decides whether a request path is exempt from observation. Checked before
 * any extraction, masking or I/O happens.
 */
export class RouteBlacklist {
  constructor(private readonly routes: PatternSet) {}

  isIgnored(path: string): boolean {
    return this.routes.test(path)
  }

  get patterns(): readonly string[] {
    return this.routes.sources
  }
}

/** Drops the query string and fragment from a request target or absolute URL. */
export function pathOf(target: string): string {
  let path = target
  const schemeIndex = path.indexOf('://')
  if (schemeIndex !== -1) {
    const slash = path.indexOf('/', schemeIndex + 3)
    path = slash === -1 ? '/' : path.slice(slash)
  }
  const end = path.search(/[?#]/)
  return end === -1 ? path : path.slice(0, end)
}
