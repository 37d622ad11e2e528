import { z } from 'zod'
import type { RepositoryReference } from './lib/repo-url'
import type { SkippedFile } from './lib/file-policy'

export type { RepositoryReference }

export type FileMode = '100644' | '100755'

export function isFileMode(mode: string): mode is FileMode {
  return mode === '100644' || mode === '100755'
}

export type FileSnapshot = Readonly<{
  path: string
  content: string
  /** Blob SHA as returned by the host. */
  sha: string
  mode: FileMode
}>

export interface RepositorySnapshot {
  ref: RepositoryReference
  baseCommitSha: string
  baseTreeSha: string
  files: FileSnapshot[]
  skipped: SkippedFile[]
  /** Every path in the recursive listing (files, symlinks, submodules, directories) and its git mode. */
  treeModes: ReadonlyMap<string, string>
  /** The host cut the recursive listing short. */
  truncated: boolean
}

export interface FileChange {
  path: string
  content: string
  /** Path was not part of the fetched snapshot. */
  created: boolean
}

export interface ChangeSet {
  changes: FileChange[]
  summary?: string
}

export interface CommitResult {
  success: true
  branch: string
  commitSha: string | null
  filesChanged: string[]
  commits: 0 | 1
}

export interface ModelOptions {
  model?: string
  maxTokens?: number
}

/* -------------------------------------------------------------------------- */
/* Inbound request                                                             */
/* -------------------------------------------------------------------------- */

export const UpdateRequest = z.object({
  repo_url: z.string().trim().min(1, 'Required'),
  prompt: z.string().trim().min(1, 'Required'),
  base_branch: z.string().trim().min(1).optional().default('main'),
  new_branch: z.string().trim().min(1).optional(),
  file_pattern: z.string().trim().min(1).optional(),
  create_files: z.array(z.string().trim().min(1)).max(20).optional().default([]),
  model: z.string().trim().min(1).optional(),
  max_tokens: z.number().int().positive().optional(),
})
export type UpdateRequestT = z.infer<typeof UpdateRequest>

/* -------------------------------------------------------------------------- */
/* Model output                                                                */
/* -------------------------------------------------------------------------- */

export const ProposedChange = z.object({
  path: z.string().min(1),
  content: z.string(),
})

export const ProposedChanges = z.object({
  changes: z.array(ProposedChange),
  summary: z.string().optional(),
})
export type ProposedChangesT = z.infer<typeof ProposedChanges>
