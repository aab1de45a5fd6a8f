import { SearchManifestSchema } from './protocol.js'
import type { DocumentRecord } from './types.js'

export class SearchManifestError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid search manifest:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`)
    this.name = 'SearchManifestError'
    this.issues = issues
  }
}

function formatPath(path: ReadonlyArray<string | number>): string {
  return path.length > 0 ? path.join('.') : '(root)'
}

/**
 * Validate a manifest of title/url/keywords triples.
 *
 * Throws {@link SearchManifestError} listing every violation, one
 * `"<path>: <message>"` line each.
 */
export function parseSearchManifest(data: unknown): DocumentRecord[] {
  const parsed = SearchManifestSchema.safeParse(data)
  if (!parsed.success) {
    throw new SearchManifestError(
      parsed.error.issues.map((issue) => `${formatPath(issue.path)}: ${issue.message}`)
    )
  }
  return parsed.data
}
