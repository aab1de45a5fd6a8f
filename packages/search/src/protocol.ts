import { z } from 'zod'

export const DocumentRecordSchema = z.object({
  title: z.string().min(1),
  url: z.string().min(1),
  keywords: z.string(),
  chapter: z.string().min(1).optional(),
})

export const SearchManifestSchema = z.array(DocumentRecordSchema)

export const SearchLocaleSchema = z.enum(['ru', 'en'])

export const SearchConfigSchema = z.object({
  minQueryLength: z.number().int().positive().default(2),
  summaryTokenLimit: z.number().int().positive().default(5),
  locale: SearchLocaleSchema.default('ru'),
  basePath: z.string().default(''),
})

export type DocumentRecordInput = z.infer<typeof DocumentRecordSchema>
export type SearchManifest = z.infer<typeof SearchManifestSchema>
export type SearchLocale = z.infer<typeof SearchLocaleSchema>
export type SearchConfig = z.infer<typeof SearchConfigSchema>
export type SearchConfigInput = z.input<typeof SearchConfigSchema>
