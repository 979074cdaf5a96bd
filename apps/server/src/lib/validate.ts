import type { Context } from 'hono'
import type { z } from 'zod'

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

function validationFailed(c: Context, error: z.ZodError): Response {
  return c.json({ error: 'Validation failed.', fields: error.flatten().fieldErrors }, 400)
}

/** Parse and validate request body with a Zod schema. Returns 400 on failure. */
export async function parseBody<T>(c: Context, schema: Schema<T>): Promise<T | Response> {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    return c.json({ error: 'Invalid JSON body.' }, 400)
  }

  const result = schema.safeParse(body)
  if (!result.success) return validationFailed(c, result.error)
  return result.data
}

/** Validate the query string with a Zod schema. Returns 400 on failure. */
export function parseQuery<T>(c: Context, schema: Schema<T>): T | Response {
  const result = schema.safeParse(c.req.query())
  if (!result.success) return validationFailed(c, result.error)
  return result.data
}

/** Check if a parse result is a Response (validation error). */
export function isResponse(value: unknown): value is Response {
  return value instanceof Response
}
