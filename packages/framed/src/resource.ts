/**
 * Path pattern matching
 *
 * Supports path parameters (e.g., /users/:id) and query parameters.
 */

export interface MatchInfo {
  path: Record<string, string>
  query: Record<string, string>
}

export class ResourceDef {
  private readonly segments: string[]

  constructor(private readonly pattern: string) {
    this.segments = pattern.split('/').filter(Boolean)
  }

  get source(): string {
    return this.pattern
  }

  /**
   * Match a URL path against the pattern
   * @returns extracted params, or null if no match
   */
  match(path: string): Record<string, string> | null {
    const pathParts = path.split('/').filter(Boolean)

    if (this.segments.length !== pathParts.length) {
      return null
    }

    const params: Record<string, string> = {}

    for (const [i, patternPart] of this.segments.entries()) {
      const pathPart = pathParts[i]
      if (pathPart === undefined) {
        return null
      }

      if (patternPart.startsWith(':')) {
        params[patternPart.slice(1)] = safeDecode(pathPart)
      } else if (patternPart !== pathPart) {
        return null
      }
    }

    return params
  }
}

/**
 * Split an origin-form request target into its path and query parameters.
 * The path is kept as it arrived; only the query is decoded.
 */
export function parseUri(uri: string): { path: string; query: Record<string, string> } {
  const queryStart = uri.indexOf('?')
  const path = queryStart === -1 ? uri : uri.slice(0, queryStart)
  const search = queryStart === -1 ? '' : uri.slice(queryStart + 1)

  const query: Record<string, string> = {}
  for (const [key, value] of new URLSearchParams(search).entries()) {
    query[key] = value
  }
  return { path, query }
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment)
  } catch {
    return segment
  }
}
