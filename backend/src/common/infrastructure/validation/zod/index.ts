/* eslint-disable prettier/prettier */
import { z } from 'zod'
import { BadRequestError } from '../../../domain/errors/bad-request-error.js'

/**
 * @file index.ts
 * @description
 * Zod validation helper shared by HTTP handlers and config loaders.
 *
 * - Returns the typed data when valid
 * - Throws when invalid; `BadRequestError` unless the caller supplies
 *   its own error factory
 */

export type ValidationFailure = (message: string, issues: string[]) => Error

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'} -> ${issue.message}`)
}

export function dataValidation<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  data: unknown,
  opts?: { message?: string; toError?: ValidationFailure },
): z.infer<TSchema> {
  const parsed = schema.safeParse(data)

  if (!parsed.success) {
    const issues = formatIssues(parsed.error)
    const message = opts?.message ?? `Invalid data: ${issues.join(' | ')}`

    if (opts?.toError) throw opts.toError(message, issues)
    throw new BadRequestError(message, { issues })
  }

  return parsed.data
}
