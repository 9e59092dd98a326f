import type { z } from 'zod'

export type SafeJsonParseResult<T = unknown> =
  | { ok: true; value: T }
  | { ok: false; error: string }

export function safeJsonParse(input: string): SafeJsonParseResult {
  try {
    const value: unknown = JSON.parse(input)
    return { ok: true, value }
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : 'Invalid JSON',
    }
  }
}

/** Parse and validate in one step; schema issues are flattened to one line. */
export function parseJsonWith<T>(
  input: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): SafeJsonParseResult<T> {
  const parsed = safeJsonParse(input)
  if (!parsed.ok) return parsed

  const checked = schema.safeParse(parsed.value)
  if (!checked.success) {
    const issue = checked.error.issues[0]
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : ''
    return { ok: false, error: `${issue?.message ?? 'Schema mismatch'}${where}` }
  }
  return { ok: true, value: checked.data }
}
