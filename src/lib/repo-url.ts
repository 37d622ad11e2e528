// src/lib/repo-url.ts
import { InputValidationError } from './errors'

export type RepositoryReference = Readonly<{
  host: string
  owner: string
  repo: string
  baseBranch: string
}>

const NAME = /^[A-Za-z0-9_.-]+$/
const SSH_FORM = /^[\w.-]+@([^:/]+):(.+)$/

function invalid(url: string): InputValidationError {
  return new InputValidationError(
    `Invalid repository URL "${url}". Expected format: https://github.com/owner/repo`,
    { details: [{ path: ['repo_url'], message: 'Unrecognised repository URL' }] }
  )
}

/**
 * Accepts `https://github.com/owner/repo`, `github.com/owner/repo`,
 * `.../repo.git`, trailing slashes, extra path segments such as
 * `/tree/main`, and `git@github.com:owner/repo.git`.
 */
export function parseRepoUrl(url: string, baseBranch = 'main', allowedHost = 'github.com'): RepositoryReference {
  const input = url.trim()
  if (!input) throw invalid(url)

  let host: string
  let pathname: string
  const ssh = SSH_FORM.exec(input)
  if (ssh) {
    host = ssh[1]
    pathname = ssh[2]
  } else {
    const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(input) ? input : `https://${input}`
    let parsed: URL
    try {
      parsed = new URL(withScheme)
    } catch {
      throw invalid(url)
    }
    if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') throw invalid(url)
    host = parsed.hostname
    pathname = parsed.pathname
  }

  host = host.toLowerCase().replace(/^www\./, '')
  if (host !== allowedHost.toLowerCase()) {
    throw new InputValidationError(`Unsupported repository host "${host}"; only ${allowedHost} is configured`, {
      details: [{ path: ['repo_url'], message: 'Unsupported host' }],
    })
  }

  const parts = pathname.split('/').filter(Boolean)
  if (parts.length < 2) throw invalid(url)
  const owner = parts[0]
  const repo = parts[1].replace(/\.git$/i, '')
  if (!NAME.test(owner) || !NAME.test(repo) || repo === '.' || repo === '..') throw invalid(url)

  return Object.freeze({ host, owner, repo, baseBranch })
}

/** `refs/heads/` rules that matter for names we create or read. */
export function isValidBranchName(name: string): boolean {
  if (!name || name.length > 250) return false
  if (name.startsWith('/') || name.endsWith('/') || name.endsWith('.') || name.endsWith('.lock')) return false
  if (name.startsWith('-') || name.includes('..') || name.includes('//') || name.includes('@{')) return false
  return !/[\s~^:?*[\\\x00-\x1f\x7f]/.test(name)
}
