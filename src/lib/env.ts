import dotenv from 'dotenv'
import { ConfigError } from './errors'

export type Source = Record<string, string | undefined>

function need(source: Source, name: string) {
  const v = source[name]
  if (!v || !v.trim()) throw new ConfigError(`Missing env: ${name}`)
  return v.trim()
}

function num(source: Source, name: string, fallback: number) {
  const raw = source[name]
  if (raw === undefined || raw.trim() === '') return fallback
  const n = Number(raw)
  if (!Number.isInteger(n) || n <= 0) throw new ConfigError(`Invalid env: ${name} must be a positive integer, got "${raw}"`)
  return n
}

function str(source: Source, name: string, fallback: string) {
  const v = source[name]
  return v && v.trim() ? v.trim() : fallback
}

export function loadEnv(source: Source = process.env) {
  return {
    // Secrets. Both are required at startup.
    GITHUB_TOKEN: need(source, 'GITHUB_TOKEN'),
    ANTHROPIC_API_KEY: need(source, 'ANTHROPIC_API_KEY'),

    PORT: num(source, 'PORT', 8000),

    // Hosting API
    GITHUB_API_URL: str(source, 'GITHUB_API_URL', 'https://api.github.com').replace(/\/+$/, ''),
    GITHUB_HOST: str(source, 'GITHUB_HOST', 'github.com').toLowerCase(),
    GITHUB_CONCURRENCY: num(source, 'GITHUB_CONCURRENCY', 4),

    // AI API
    ANTHROPIC_API_URL: str(source, 'ANTHROPIC_API_URL', 'https://api.anthropic.com').replace(/\/+$/, ''),
    ANTHROPIC_MODEL: str(source, 'ANTHROPIC_MODEL', 'claude-sonnet-4-20250514'),
    MAX_TOKENS: num(source, 'MAX_TOKENS', 8192),
    MAX_TOKENS_LIMIT: num(source, 'MAX_TOKENS_LIMIT', 64000),

    // Safety limits
    MAX_PROMPT_CHARS: num(source, 'MAX_PROMPT_CHARS', 4000),
    MAX_FILES: num(source, 'MAX_FILES', 50),
    MAX_FILE_SIZE_BYTES: num(source, 'MAX_FILE_SIZE_BYTES', 200000),
    MAX_TOTAL_BYTES: num(source, 'MAX_TOTAL_BYTES', 400000),
    REQUEST_TIMEOUT_MS: num(source, 'REQUEST_TIMEOUT_MS', 300000),

    // Inbound auth. Callers must send header: X-Updater-Token: <UPDATER_API_TOKEN>
    UPDATER_API_TOKEN: str(source, 'UPDATER_API_TOKEN', ''),
  }
}

export type Env = ReturnType<typeof loadEnv>

/** Reads `.env` into process.env (without overriding) and validates it. */
export function loadEnvFromProcess(): Env {
  dotenv.config()
  return loadEnv(process.env)
}
