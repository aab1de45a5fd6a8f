import { SearchConfigSchema, type SearchConfig, type SearchConfigInput } from './protocol.js'

/** Fills every omitted field with its default; invalid values throw a ZodError. */
export function resolveSearchConfig(input: SearchConfigInput = {}): SearchConfig {
  return SearchConfigSchema.parse(input)
}

/** Pages under `/chapters/` link one directory up to reach the site root. */
export function resolveBasePath(pathname: string): string {
  return pathname.includes('/chapters/') ? '../' : ''
}
