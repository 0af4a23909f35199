/**
 * Zod schemas for the survey request body and the persisted record.
 */
import { z } from 'zod'

export const SURVEY_SOURCES = ['web', 'mobile', 'other'] as const
export type SurveySource = (typeof SURVEY_SOURCES)[number]

/** Unknown, missing or non-string sources collapse to "other" instead of failing. */
export function normalizeSource(value: unknown): SurveySource {
  if (typeof value !== 'string') return 'other'
  const candidate = value.trim().toLowerCase()
  return SURVEY_SOURCES.find((source) => source === candidate) ?? 'other'
}

// Counts code points, so astral characters such as emoji count once
function withinChars(limit: number) {
  return (value: string) => [...value].length <= limit
}

// Blank strings count as absent
const optionalText = z
  .string()
  .trim()
  .nullish()
  .transform((value) => (value ? value : undefined))

export const SurveySubmissionSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, 'Name must not be empty')
    .refine(withinChars(100), 'Name must be at most 100 characters'),
  email: z
    .string()
    .trim()
    .email('Invalid email address')
    .transform((value) => value.toLowerCase()),
  age: z
    .number()
    .int('Age must be a whole number')
    .min(13, 'Age must be at least 13')
    .max(120, 'Age must be at most 120'),
  consent: z.literal(true, {
    errorMap: () => ({ message: 'Consent must be given' }),
  }),
  rating: z
    .number()
    .int('Rating must be a whole number')
    .min(1, 'Rating must be between 1 and 5')
    .max(5, 'Rating must be between 1 and 5'),
  comments: z
    .string()
    .trim()
    .refine(withinChars(1000), 'Comments must be at most 1000 characters')
    .nullish()
    .transform((value) => value ?? ''),
  source: z.unknown().transform(normalizeSource),
  user_agent: optionalText,
  submission_id: optionalText,
})

export type SurveySubmission = z.infer<typeof SurveySubmissionSchema>

/** One line of the NDJSON store. Email and age hold SHA-256 digests, never plaintext. */
export const StorageRecordSchema = z.object({
  submission_id: z.string(),
  name: z.string(),
  consent: z.boolean(),
  rating: z.number(),
  comments: z.string(),
  source: z.string().default('other'),
  email: z.string(),
  age: z.string(),
  received_at: z.string(),
  user_agent: z.string().optional(),
  ip: z.string().optional(),
})

export type StorageRecord = z.infer<typeof StorageRecordSchema>
