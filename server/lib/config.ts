/**
 * Runtime configuration from the process environment, overlaid on .env files.
 */
import * as fs from 'fs'
import * as path from 'path'
import { z } from 'zod'
import { ConfigError, isNotFound } from './errors'
import { LOG_LEVELS, type LogThreshold } from './logger'

export interface AppConfig {
  port: number
  dataFile: string
  logLevel: LogThreshold
}

const ENV_FILES = ['.env', '.env.local']

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  SURVEY_DATA_FILE: z.string().min(1).default('data/survey.ndjson'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

// Later files win over earlier ones
export function loadEnvFiles(cwd: string): Record<string, string> {
  const env: Record<string, string> = {}
  for (const file of ENV_FILES) {
    let content: string
    try {
      content = fs.readFileSync(path.join(cwd, file), 'utf-8')
    } catch (err) {
      if (isNotFound(err)) continue
      throw err
    }
    for (const line of content.split('\n')) {
      const match = line.trim().match(/^([A-Z_]+)=["']?(.+?)["']?$/)
      if (match) env[match[1]] = match[2]
    }
  }
  return env
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const parsed = EnvSchema.safeParse({ ...loadEnvFiles(cwd), ...definedOnly(env) })
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))]
    const summary = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${summary}`, keys)
  }

  return {
    port: parsed.data.PORT,
    dataFile: path.resolve(cwd, parsed.data.SURVEY_DATA_FILE),
    logLevel: parsed.data.LOG_LEVEL,
  }
}

function definedOnly(env: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) result[key] = value
  }
  return result
}
