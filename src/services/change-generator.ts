import { z } from 'zod'
import { createLogger } from '../lib/logger'
import { AIServiceError, ParseError, errorMessage, isAbortError, type ErrorDetail } from '../lib/errors'
import { ProposedChanges, type ChangeSet, type FileChange, type FileSnapshot, type ModelOptions } from '../types'

const log = createLogger('generator')

export const ANTHROPIC_VERSION = '2023-06-01'

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>

export interface ChangeGeneratorOptions {
  apiKey: string
  apiUrl: string
  model: string
  maxTokens: number
  fetch?: FetchLike
}

export interface GenerateInput {
  files: readonly FileSnapshot[]
  prompt: string
  /** New paths the model may create. Any other unknown path is rejected. */
  createFiles?: readonly string[]
  modelOptions?: ModelOptions
  signal?: AbortSignal
}

const MessageResponse = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()),
  stop_reason: z.string().nullable().optional(),
})

const ErrorResponse = z.object({
  error: z.object({ type: z.string().optional(), message: z.string() }),
})

const SYSTEM_PROMPT = `You are an expert software engineer. You update files in a repository according to an instruction.

You receive the instruction and the current content of the repository's files, each wrapped in <file path="..."> tags.

Respond with a single JSON object and nothing else, in exactly this shape:
{"changes":[{"path":"relative/path.ext","content":"<complete new file content>"}],"summary":"<one sentence>"}

Rules:
1. Include only files whose content must change. If nothing needs to change, return {"changes":[]}.
2. "content" is the COMPLETE new content of the file, never a diff or an excerpt.
3. Use the exact paths shown in the <file> tags. Only create a new file when its path is listed under NEW FILES ALLOWED.
4. Preserve each file's structure, indentation and style; change only what the instruction requires.
5. Do not add comments describing your changes. No Markdown, no text outside the JSON.`

export function buildUserMessage(input: Pick<GenerateInput, 'files' | 'prompt' | 'createFiles'>): string {
  const files = input.files.map((f) => `<file path="${f.path}">\n${f.content}\n</file>`).join('\n\n')
  const allowed = input.createFiles?.length ? input.createFiles.join('\n') : '(none)'
  return `INSTRUCTION:\n${input.prompt}\n\nNEW FILES ALLOWED:\n${allowed}\n\nREPOSITORY FILES:\n${files}`
}

/**
 * Asks the model for full replacement contents and turns its answer into a
 * ChangeSet. The reply must follow the JSON shape in SYSTEM_PROMPT; anything
 * else is a ParseError rather than a best-effort guess.
 */
export class ChangeGenerator {
  private readonly fetchImpl: FetchLike

  constructor(private readonly options: ChangeGeneratorOptions) {
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init))
  }

  async generate(input: GenerateInput): Promise<ChangeSet> {
    const model = input.modelOptions?.model ?? this.options.model
    const maxTokens = input.modelOptions?.maxTokens ?? this.options.maxTokens

    log.info({ model, files: input.files.length }, 'requesting changes')
    const text = await this.complete(model, maxTokens, buildUserMessage(input), input.signal)
    const changeSet = parseChangeResponse(text, input.files, input.createFiles ?? [])
    log.info({ model, changed: changeSet.changes.length }, 'changes parsed')
    return changeSet
  }

  private async complete(model: string, maxTokens: number, userMessage: string, signal?: AbortSignal): Promise<string> {
    let res: Response
    try {
      res = await this.fetchImpl(`${this.options.apiUrl}/v1/messages`, {
        method: 'POST',
        headers: {
          'x-api-key': this.options.apiKey,
          'anthropic-version': ANTHROPIC_VERSION,
          'content-type': 'application/json',
        },
        body: JSON.stringify({
          model,
          max_tokens: maxTokens,
          system: SYSTEM_PROMPT,
          messages: [{ role: 'user', content: userMessage }],
        }),
        signal,
      })
    } catch (err) {
      if (isAbortError(err)) throw err
      throw new AIServiceError(`AI API request failed: ${errorMessage(err)}`, { cause: err })
    }

    const raw = await res.text()
    if (!res.ok) {
      throw new AIServiceError(`AI API error ${res.status}: ${describeError(raw)}`)
    }

    const envelope = MessageResponse.safeParse(safeJson(raw))
    if (!envelope.success) {
      throw new AIServiceError('AI API returned an unexpected response body')
    }
    if (envelope.data.stop_reason === 'max_tokens') {
      throw new ParseError('AI response was cut off at the token limit; raise max_tokens or narrow the file set')
    }
    return envelope.data.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('')
  }
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw)
  } catch {
    return undefined
  }
}

function describeError(raw: string): string {
  const parsed = ErrorResponse.safeParse(safeJson(raw))
  if (parsed.success) return parsed.data.error.message
  return raw.slice(0, 200) || 'no response body'
}

/** Strips one surrounding Markdown fence, if the model added it anyway. */
export function unwrapFence(text: string): string {
  const m = /^```[\w-]*[ \t]*\r?\n([\s\S]*?)\r?\n?```$/.exec(text.trim())
  return m ? m[1] : text.trim()
}

/** `./a\\b.ts` -> `a/b.ts`; null for absolute or escaping paths. */
export function normalizeRepoPath(p: string): string | null {
  const n = p.trim().replace(/\\/g, '/').replace(/^(\.\/)+/, '')
  if (!n || n.startsWith('/') || /^[A-Za-z]:\//.test(n)) return null
  const segments = n.split('/')
  if (segments.some((s) => s === '' || s === '.' || s === '..')) return null
  return n
}

export function parseChangeResponse(
  text: string,
  files: readonly FileSnapshot[],
  createFiles: readonly string[]
): ChangeSet {
  const body = unwrapFence(text)
  if (!body) return { changes: [] }

  let json: unknown
  try {
    json = JSON.parse(body)
  } catch (err) {
    throw new ParseError(`AI response is not valid JSON: ${errorMessage(err)}`)
  }

  const parsed = ProposedChanges.safeParse(json)
  if (!parsed.success) {
    const details: ErrorDetail[] = parsed.error.issues.map((i) => ({ path: i.path, message: i.message }))
    throw new ParseError('AI response does not match the expected {changes:[{path,content}]} shape', { details })
  }

  const current = new Map(files.map((f) => [f.path, f.content]))
  const creatable = new Set(createFiles.map((p) => normalizeRepoPath(p)).filter((p): p is string => p !== null))
  const seen = new Set<string>()
  const changes: FileChange[] = []

  for (const proposed of parsed.data.changes) {
    const path = normalizeRepoPath(proposed.path)
    if (path === null) throw new ParseError(`AI proposed an invalid path "${proposed.path}"`)
    if (seen.has(path)) throw new ParseError(`AI proposed "${path}" more than once`)
    seen.add(path)

    const before = current.get(path)
    if (before === undefined && !creatable.has(path)) {
      throw new ParseError(`AI proposed a change to "${path}", which was not among the files sent to it`)
    }
    if (before === proposed.content) continue
    changes.push({ path, content: proposed.content, created: before === undefined })
  }

  return parsed.data.summary ? { changes, summary: parsed.data.summary } : { changes }
}
