/**
 * Request body parsing and survey validation.
 * Every violated field is reported, one detail per field.
 */
import type { ZodError } from 'zod'
import { SurveySubmissionSchema, type SurveySubmission } from './schemas'

export interface ValidationDetail {
  loc: (string | number)[]
  msg: string
  type: string
}

export type ValidationResult =
  | { success: true; data: SurveySubmission }
  | { success: false; details: ValidationDetail[] }

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Parses a raw body; returns null unless it is a JSON object. */
export function parseJsonObject(body: string): Record<string, unknown> | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(body)
  } catch {
    return null
  }
  return isJsonObject(parsed) ? parsed : null
}

export function toValidationDetails(error: ZodError): ValidationDetail[] {
  const seen = new Set<string>()
  const details: ValidationDetail[] = []
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? String(issue.path[0]) : '__root__'
    if (seen.has(field)) continue
    seen.add(field)
    details.push({ loc: ['body', ...issue.path], msg: issue.message, type: issue.code })
  }
  return details
}

export function validateSubmission(raw: Record<string, unknown>): ValidationResult {
  const parsed = SurveySubmissionSchema.safeParse(raw)
  if (!parsed.success) {
    return { success: false, details: toValidationDetails(parsed.error) }
  }
  return { success: true, data: parsed.data }
}
