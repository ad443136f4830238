import { z, type ZodError, type ZodTypeAny } from 'zod'

export type SerializedIssue = { path: string; message: string; code: string }

export const serializeZodIssues = (error: ZodError): SerializedIssue[] =>
  error.issues.map((i) => ({
    path: i.path.join('.'),
    message: i.message,
    code: i.code,
  }))

export type Parsed<T> = { ok: true; data: T } | { ok: false; issues: SerializedIssue[] }

export function parseWithSchema<TSchema extends ZodTypeAny>(raw: unknown, schema: TSchema): Parsed<z.infer<TSchema>> {
  const parsed = schema.safeParse(raw)
  if (!parsed.success) return { ok: false, issues: serializeZodIssues(parsed.error) }
  return { ok: true, data: parsed.data }
}
