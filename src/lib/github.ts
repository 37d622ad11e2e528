import { Octokit, RequestError } from 'octokit'
import {
  AuthError,
  ConflictError,
  HostError,
  NotFoundError,
  RateLimitedError,
  WriteError,
  errorMessage,
  isAbortError,
} from './errors'

export interface GitHubClientOptions {
  token: string
  baseUrl?: string
  /** Replaces the global fetch; tests route requests to an in-process fake. */
  fetch?: (url: string, init: RequestInit) => Promise<Response>
}

export function ghClient({ token, baseUrl, fetch }: GitHubClientOptions): Octokit {
  return new Octokit({
    auth: token,
    baseUrl,
    userAgent: 'ai-branch-updater',
    request: fetch ? { fetch } : undefined,
    // Failures surface to the caller as they happen; nothing is retried or queued.
    retry: { enabled: false },
    throttle: { enabled: false, onRateLimit: () => false, onSecondaryRateLimit: () => false },
  })
}

export function decode(content: string, encoding = 'base64'): Buffer {
  return Buffer.from(content, encoding === 'base64' ? 'base64' : 'utf8')
}

function header(err: RequestError, name: string): string | undefined {
  const v = err.response?.headers[name]
  return v === undefined ? undefined : String(v)
}

function rateLimit(err: RequestError): RateLimitedError | null {
  const throttled =
    err.status === 429 ||
    (err.status === 403 && (header(err, 'x-ratelimit-remaining') === '0' || /rate limit/i.test(err.message)))
  if (!throttled) return null
  const reset = Number(header(err, 'x-ratelimit-reset'))
  return new RateLimitedError('GitHub API rate limit exceeded', {
    cause: err,
    resetAt: Number.isFinite(reset) && reset > 0 ? new Date(reset * 1000) : undefined,
  })
}

/**
 * Maps an Octokit failure on the read side. 404 names `what` so callers can tell
 * a missing repository from a missing branch. GitHub answers 409 for any git
 * data read on a repository with no commits.
 */
export function toReadError(err: unknown, what: string): unknown {
  if (!(err instanceof RequestError)) return err
  const limited = rateLimit(err)
  if (limited) return limited
  if (err.status === 401) return new AuthError('GitHub rejected the configured token', { cause: err })
  if (err.status === 403) return new AuthError(`Token lacks permission to read ${what}`, { cause: err })
  if (err.status === 404) return new NotFoundError(`${what} not found`, { cause: err })
  if (err.status === 409) return new NotFoundError(`${what} not found: repository is empty`, { cause: err })
  return new HostError(`Reading ${what} failed (HTTP ${err.status}): ${err.message}`, { cause: err })
}

/**
 * Maps a failure on the write side. A ref update the host refuses (409/422 on a
 * ref call) is a conflict; everything else is a WriteError.
 */
export function toWriteError(err: unknown, step: string, opts: { refCall?: boolean } = {}): unknown {
  if (isAbortError(err)) return err
  if (err instanceof RequestError) {
    const limited = rateLimit(err)
    if (limited) return limited
    if (opts.refCall && (err.status === 409 || err.status === 422)) {
      return new ConflictError(`${step}: ${err.message}`, { cause: err })
    }
    return new WriteError(`${step} failed (HTTP ${err.status}): ${err.message}`, { cause: err })
  }
  return new WriteError(`${step} failed: ${errorMessage(err)}`, { cause: err })
}
