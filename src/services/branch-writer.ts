import type { Octokit } from 'octokit'
import { createLogger } from '../lib/logger'
import { ConflictError } from '../lib/errors'
import { toWriteError } from '../lib/github'
import { mapWithConcurrency } from '../lib/pool'
import type { ChangeSet, CommitResult, FileMode, RepositoryReference } from '../types'

const log = createLogger('writer')

export interface BranchWriterOptions {
  octokit: Octokit
  concurrency: number
}

export interface WriteInput {
  ref: RepositoryReference
  changeSet: ChangeSet
  baseCommitSha: string
  baseTreeSha: string
  branch: string
  message: string
  /** Modes of the files as read; changed files keep theirs, new files get 100644. */
  modes?: ReadonlyMap<string, FileMode>
  signal?: AbortSignal
}

interface TreeEntry {
  path: string
  mode: FileMode
  type: 'blob'
  sha: string
}

/**
 * Writes a ChangeSet as one commit on a new branch through the git data API:
 * ref -> blobs -> tree (over the base tree) -> commit -> ref update.
 * Objects created before a failure are not cleaned up.
 */
export class BranchWriter {
  private readonly octokit: Octokit

  constructor(private readonly options: BranchWriterOptions) {
    this.octokit = options.octokit
  }

  async write(input: WriteInput): Promise<CommitResult> {
    const { ref, changeSet, branch } = input
    const { owner, repo } = ref
    const request = { signal: input.signal }

    if (changeSet.changes.length === 0) {
      log.info({ owner, repo, branch }, 'empty change set; nothing written')
      return { success: true, branch, commitSha: null, filesChanged: [], commits: 0 }
    }

    try {
      await this.octokit.rest.git.createRef({
        owner,
        repo,
        ref: `refs/heads/${branch}`,
        sha: input.baseCommitSha,
        request,
      })
    } catch (err) {
      const mapped = toWriteError(err, `Create branch '${branch}'`, { refCall: true })
      if (mapped instanceof ConflictError) {
        throw new ConflictError(`Branch '${branch}' already exists in ${owner}/${repo}`, { cause: err })
      }
      throw mapped
    }

    const entries = await mapWithConcurrency(changeSet.changes, this.options.concurrency, async (change): Promise<TreeEntry> => {
      try {
        const { data } = await this.octokit.rest.git.createBlob({
          owner,
          repo,
          content: change.content,
          encoding: 'utf-8',
          request,
        })
        return { path: change.path, mode: input.modes?.get(change.path) ?? '100644', type: 'blob', sha: data.sha }
      } catch (err) {
        throw toWriteError(err, `Upload ${change.path}`)
      }
    })

    let treeSha: string
    try {
      const { data } = await this.octokit.rest.git.createTree({
        owner,
        repo,
        base_tree: input.baseTreeSha,
        tree: entries,
        request,
      })
      treeSha = data.sha
    } catch (err) {
      throw toWriteError(err, 'Create tree')
    }

    let commitSha: string
    try {
      const { data } = await this.octokit.rest.git.createCommit({
        owner,
        repo,
        message: input.message,
        tree: treeSha,
        parents: [input.baseCommitSha],
        request,
      })
      commitSha = data.sha
    } catch (err) {
      throw toWriteError(err, 'Create commit')
    }

    try {
      await this.octokit.rest.git.updateRef({
        owner,
        repo,
        ref: `heads/${branch}`,
        sha: commitSha,
        force: false,
        request,
      })
    } catch (err) {
      const mapped = toWriteError(err, `Update branch '${branch}'`, { refCall: true })
      if (mapped instanceof ConflictError) {
        throw new ConflictError(`Branch '${branch}' moved while the commit was being written`, { cause: err })
      }
      throw mapped
    }

    const filesChanged = changeSet.changes.map((c) => c.path)
    log.info({ owner, repo, branch, commit: commitSha, files: filesChanged.length }, 'commit written')
    return { success: true, branch, commitSha, filesChanged, commits: 1 }
  }
}
