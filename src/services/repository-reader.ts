import type { Octokit } from 'octokit'
import { createLogger } from '../lib/logger'
import { decode, toReadError } from '../lib/github'
import { NotFoundError } from '../lib/errors'
import { createFilePolicy, decodeText, selectFiles, type FilePolicyOptions, type SkippedFile } from '../lib/file-policy'
import { mapWithConcurrency } from '../lib/pool'
import type { FileMode, FileSnapshot, RepositoryReference, RepositorySnapshot } from '../types'

const log = createLogger('reader')

export interface RepositoryReaderOptions {
  octokit: Octokit
  policy: Omit<FilePolicyOptions, 'pattern'>
  concurrency: number
}

export interface ReadOptions {
  /** Glob narrowing the files sent to the model. */
  pattern?: string
  signal?: AbortSignal
}

interface BlobEntry {
  path: string
  sha: string
  size?: number
  mode: FileMode
}

/**
 * Lists a branch's tree and fetches the text files the file policy keeps.
 */
export class RepositoryReader {
  private readonly octokit: Octokit

  constructor(private readonly options: RepositoryReaderOptions) {
    this.octokit = options.octokit
  }

  async read(ref: RepositoryReference, opts: ReadOptions = {}): Promise<RepositorySnapshot> {
    const { owner, repo, baseBranch } = ref
    const request = { signal: opts.signal }

    const baseCommitSha = await this.resolveBranch(ref, opts.signal)

    let baseTreeSha: string
    try {
      const { data } = await this.octokit.rest.git.getCommit({ owner, repo, commit_sha: baseCommitSha, request })
      baseTreeSha = data.tree.sha
    } catch (err) {
      throw toReadError(err, `Commit ${baseCommitSha}`)
    }

    let entries: BlobEntry[]
    let truncated: boolean
    const treeModes = new Map<string, string>()
    try {
      const { data } = await this.octokit.rest.git.getTree({ owner, repo, tree_sha: baseTreeSha, recursive: '1', request })
      truncated = data.truncated
      for (const e of data.tree) {
        if (e.path && e.mode) treeModes.set(e.path, e.mode)
      }
      entries = data.tree.flatMap((e): BlobEntry[] => {
        // symlinks (120000) and submodules are never sent to the model
        if (e.type !== 'blob' || !e.path || !e.sha || e.mode === '120000') return []
        return [{ path: e.path, sha: e.sha, size: e.size, mode: e.mode === '100755' ? '100755' : '100644' }]
      })
    } catch (err) {
      throw toReadError(err, `Tree of ${owner}/${repo}@${baseBranch}`)
    }
    if (truncated) {
      log.warn({ owner, repo, branch: baseBranch }, 'tree listing truncated by host; only listed files are considered')
    }

    const policy = createFilePolicy({ ...this.options.policy, pattern: opts.pattern })
    const { selected, skipped } = selectFiles(entries, policy)

    const fetched = await mapWithConcurrency(selected, this.options.concurrency, (entry) =>
      this.fetchBlob(ref, entry, opts.signal)
    )

    const files: FileSnapshot[] = []
    const skippedAll: SkippedFile[] = [...skipped]
    fetched.forEach((content, i) => {
      const entry = selected[i]
      if (content === null) skippedAll.push({ path: entry.path, reason: 'binary' })
      else files.push({ path: entry.path, content, sha: entry.sha, mode: entry.mode })
    })

    log.info(
      { owner, repo, branch: baseBranch, files: files.length, skipped: skippedAll.length },
      'repository snapshot read'
    )
    return { ref, baseCommitSha, baseTreeSha, files, skipped: skippedAll, treeModes, truncated }
  }

  /** Head commit of the base branch. Tells a missing repository from a missing branch. */
  private async resolveBranch(ref: RepositoryReference, signal?: AbortSignal): Promise<string> {
    const { owner, repo, baseBranch } = ref
    try {
      const { data } = await this.octokit.rest.git.getRef({ owner, repo, ref: `heads/${baseBranch}`, request: { signal } })
      return data.object.sha
    } catch (err) {
      const mapped = toReadError(err, `Branch '${baseBranch}' in ${owner}/${repo}`)
      if (mapped instanceof NotFoundError) {
        try {
          await this.octokit.rest.repos.get({ owner, repo, request: { signal } })
        } catch (repoErr) {
          throw toReadError(repoErr, `Repository ${owner}/${repo}`)
        }
      }
      throw mapped
    }
  }

  private async fetchBlob(ref: RepositoryReference, entry: BlobEntry, signal?: AbortSignal): Promise<string | null> {
    try {
      const { data } = await this.octokit.rest.git.getBlob({
        owner: ref.owner,
        repo: ref.repo,
        file_sha: entry.sha,
        request: { signal },
      })
      return decodeText(decode(data.content, data.encoding))
    } catch (err) {
      throw toReadError(err, `File ${entry.path}`)
    }
  }
}
