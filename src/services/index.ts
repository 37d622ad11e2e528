import type { Octokit } from 'octokit'
import type { Env } from '../lib/env'
import { ghClient, type GitHubClientOptions } from '../lib/github'
import { BranchWriter } from './branch-writer'
import { ChangeGenerator, type FetchLike } from './change-generator'
import { RepositoryReader } from './repository-reader'
import { RepoUpdater } from './updater'

export { BranchWriter } from './branch-writer'
export { ChangeGenerator } from './change-generator'
export { RepositoryReader } from './repository-reader'
export { RepoUpdater, validateUpdateRequest, generateBranchName, commitMessage } from './updater'

export interface ServiceOverrides {
  octokit?: Octokit
  /** Transport for GitHub calls when no Octokit is given. */
  githubFetch?: GitHubClientOptions['fetch']
  /** Transport for AI API calls. */
  aiFetch?: FetchLike
  now?: () => Date
}

/** Wires the three pipeline steps from configuration. */
export function createUpdater(env: Env, overrides: ServiceOverrides = {}): RepoUpdater {
  const octokit =
    overrides.octokit ?? ghClient({ token: env.GITHUB_TOKEN, baseUrl: env.GITHUB_API_URL, fetch: overrides.githubFetch })

  return new RepoUpdater({
    reader: new RepositoryReader({
      octokit,
      concurrency: env.GITHUB_CONCURRENCY,
      policy: {
        maxFileSize: env.MAX_FILE_SIZE_BYTES,
        maxFiles: env.MAX_FILES,
        maxTotalBytes: env.MAX_TOTAL_BYTES,
      },
    }),
    generator: new ChangeGenerator({
      apiKey: env.ANTHROPIC_API_KEY,
      apiUrl: env.ANTHROPIC_API_URL,
      model: env.ANTHROPIC_MODEL,
      maxTokens: env.MAX_TOKENS,
      fetch: overrides.aiFetch,
    }),
    writer: new BranchWriter({ octokit, concurrency: env.GITHUB_CONCURRENCY }),
    limits: {
      githubHost: env.GITHUB_HOST,
      maxPromptChars: env.MAX_PROMPT_CHARS,
      maxTokensLimit: env.MAX_TOKENS_LIMIT,
    },
    now: overrides.now,
  })
}
