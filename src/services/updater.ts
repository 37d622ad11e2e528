import { customAlphabet } from 'nanoid'
import { createLogger } from '../lib/logger'
import { InputValidationError, type ErrorDetail } from '../lib/errors'
import { isValidBranchName, parseRepoUrl } from '../lib/repo-url'
import { normalizeRepoPath, type ChangeGenerator } from './change-generator'
import type { BranchWriter } from './branch-writer'
import type { RepositoryReader } from './repository-reader'
import {
  UpdateRequest,
  type ChangeSet,
  type CommitResult,
  isFileMode,
  type FileMode,
  type RepositorySnapshot,
  type UpdateRequestT,
} from '../types'

const log = createLogger('updater')

const suffix = customAlphabet('0123456789abcdef', 6)

const TREE_MODE = '040000'

export interface UpdaterLimits {
  githubHost: string
  maxPromptChars: number
  maxTokensLimit: number
}

export interface UpdaterDeps {
  reader: RepositoryReader
  generator: ChangeGenerator
  writer: BranchWriter
  limits: UpdaterLimits
  now?: () => Date
}

export interface UpdateOutcome {
  result: CommitResult
  summary?: string
  snapshot: RepositorySnapshot
}

export interface PreviewOutcome {
  branch: string
  changeSet: ChangeSet
  snapshot: RepositorySnapshot
}

/** `feature/ai-updates-20250101-120000-3fa9c1` (UTC). */
export function generateBranchName(now = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  const stamp =
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}` +
    `-${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`
  return `feature/ai-updates-${stamp}-${suffix()}`
}

export function commitMessage(prompt: string): string {
  const oneLine = prompt.replace(/\s+/g, ' ').trim()
  return `AI Update: ${oneLine.slice(0, 50)}${oneLine.length > 50 ? '...' : ''}`
}

/** Parses an inbound body; every failure becomes an InputValidationError with per-field details. */
export function validateUpdateRequest(body: unknown, limits: UpdaterLimits): UpdateRequestT {
  const parsed = UpdateRequest.safeParse(body ?? {})
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => ({ path: i.path, message: i.message }))
    throw new InputValidationError('Invalid request body', { details })
  }

  const req = parsed.data
  const details: ErrorDetail[] = []
  if (req.prompt.length > limits.maxPromptChars) {
    details.push({ path: ['prompt'], message: `Must be at most ${limits.maxPromptChars} characters` })
  }
  if (req.max_tokens !== undefined && req.max_tokens > limits.maxTokensLimit) {
    details.push({ path: ['max_tokens'], message: `Must be at most ${limits.maxTokensLimit}` })
  }
  if (!isValidBranchName(req.base_branch)) {
    details.push({ path: ['base_branch'], message: 'Not a valid branch name' })
  }
  if (req.new_branch !== undefined && !isValidBranchName(req.new_branch)) {
    details.push({ path: ['new_branch'], message: 'Not a valid branch name' })
  }
  req.create_files.forEach((p, i) => {
    if (normalizeRepoPath(p) === null) details.push({ path: ['create_files', i], message: 'Not a relative file path' })
  })
  if (details.length > 0) throw new InputValidationError('Invalid request body', { details })
  return req
}

/**
 * The request pipeline: read the base branch, ask the model for changes, write
 * them to a new branch. Each step's failure ends the request.
 */
export class RepoUpdater {
  private readonly now: () => Date

  constructor(private readonly deps: UpdaterDeps) {
    this.now = deps.now ?? (() => new Date())
  }

  get limits(): UpdaterLimits {
    return this.deps.limits
  }

  async update(req: UpdateRequestT, signal?: AbortSignal): Promise<UpdateOutcome> {
    const plan = await this.preview(req, signal)
    return this.apply(plan, req.prompt, signal)
  }

  /** Runs the read and generate steps only. Nothing is written. */
  async preview(req: UpdateRequestT, signal?: AbortSignal): Promise<PreviewOutcome> {
    const ref = parseRepoUrl(req.repo_url, req.base_branch, this.deps.limits.githubHost)
    const branch = req.new_branch ?? generateBranchName(this.now())
    log.info({ owner: ref.owner, repo: ref.repo, base: ref.baseBranch, branch }, 'update requested')

    const snapshot = await this.deps.reader.read(ref, { pattern: req.file_pattern, signal })
    const createFiles = checkNewPaths(req.create_files, snapshot)
    if (snapshot.files.length === 0 && createFiles.length === 0) {
      log.info({ owner: ref.owner, repo: ref.repo }, 'no eligible files; skipping generation')
      return { branch, changeSet: { changes: [] }, snapshot }
    }
    const changeSet = await this.deps.generator.generate({
      files: snapshot.files,
      prompt: req.prompt,
      createFiles,
      modelOptions: { model: req.model, maxTokens: req.max_tokens },
      signal,
    })
    return { branch, changeSet, snapshot }
  }

  /** Writes a previewed ChangeSet to its branch. */
  async apply(plan: PreviewOutcome, prompt: string, signal?: AbortSignal): Promise<UpdateOutcome> {
    const { branch, changeSet, snapshot } = plan
    const modes = new Map<string, FileMode>()
    for (const [path, mode] of snapshot.treeModes) {
      if (isFileMode(mode)) modes.set(path, mode)
    }
    const result = await this.deps.writer.write({
      ref: snapshot.ref,
      changeSet,
      baseCommitSha: snapshot.baseCommitSha,
      baseTreeSha: snapshot.baseTreeSha,
      branch,
      message: commitMessage(prompt),
      modes,
      signal,
    })
    return { result, summary: changeSet.summary, snapshot }
  }
}

/**
 * `create_files` may only name paths absent from the base tree. An existing file
 * the model was not shown would otherwise be replaced blind.
 */
function checkNewPaths(createFiles: readonly string[], snapshot: RepositorySnapshot): string[] {
  const { treeModes, ref } = snapshot
  const details: ErrorDetail[] = []
  const paths = createFiles.map((p, i) => {
    const path = normalizeRepoPath(p) ?? p
    const existing = treeModes.get(path)
    if (existing === TREE_MODE) {
      details.push({ path: ['create_files', i], message: `"${path}" is a directory in ${ref.baseBranch}` })
    } else if (existing !== undefined) {
      details.push({ path: ['create_files', i], message: `"${path}" already exists in ${ref.baseBranch}` })
    } else {
      const segments = path.split('/')
      for (let n = 1; n < segments.length; n++) {
        const parent = segments.slice(0, n).join('/')
        const mode = treeModes.get(parent)
        if (mode !== undefined && mode !== TREE_MODE) {
          details.push({ path: ['create_files', i], message: `"${parent}" is not a directory in ${ref.baseBranch}` })
          break
        }
      }
    }
    return path
  })
  if (details.length > 0) throw new InputValidationError('create_files conflicts with the base tree', { details })
  return paths
}
