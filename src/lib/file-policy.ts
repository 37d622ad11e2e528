// src/lib/file-policy.ts
import path from 'node:path';
import defaults from './file-policy.json';

export type SkipReason = 'binary' | 'too_large' | 'excluded' | 'budget' | 'pattern';

export interface SkippedFile {
  path: string;
  reason: SkipReason;
}

export interface FilePolicyOptions {
  maxFileSize: number;
  maxFiles: number;
  maxTotalBytes: number;
  /** Caller glob such as `*.py` or `src/**\/*.ts`. Without a `/` it matches basenames. */
  pattern?: string;
  extensions?: string[];
  filenames?: string[];
  exclude?: string[];
}

export interface FilePolicy {
  readonly maxFileSize: number;
  readonly maxFiles: number;
  readonly maxTotalBytes: number;
  accepts(filePath: string): boolean;
  isExcluded(filePath: string): boolean;
  matchesPattern(filePath: string): boolean;
}

function norm(p: string): string {
  return p.replace(/\\/g, '/').replace(/^\.\/+/, '');
}

/** glob -> RegExp: `**\/` => zero or more dirs, ** => .*, * => [^/]*, ? => [^/] */
export function globToRegExp(glob: string): RegExp {
  const g = norm(glob)
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*\*\//g, '::DSS::')
    .replace(/\*\*/g, '::DS::')
    .replace(/\*/g, '[^/]*')
    .replace(/\?/g, '[^/]')
    .replace(/::DSS::/g, '(?:.*/)?')
    .replace(/::DS::/g, '.*');
  return new RegExp('^' + g + '$');
}

export function createFilePolicy(options: FilePolicyOptions): FilePolicy {
  const extensions = new Set((options.extensions ?? defaults.extensions).map((e) => e.toLowerCase()));
  const filenames = new Set(options.filenames ?? defaults.filenames);
  const exclude = (options.exclude ?? defaults.exclude).map(globToRegExp);
  const pattern = options.pattern?.trim() ? norm(options.pattern.trim()) : undefined;
  const patternRe = pattern ? globToRegExp(pattern) : undefined;
  const patternOnBasename = pattern ? !pattern.includes('/') : false;

  return {
    maxFileSize: options.maxFileSize,
    maxFiles: options.maxFiles,
    maxTotalBytes: options.maxTotalBytes,
    accepts(filePath) {
      const base = path.posix.basename(norm(filePath));
      if (filenames.has(base)) return true;
      return extensions.has(path.posix.extname(base).toLowerCase());
    },
    isExcluded(filePath) {
      const n = norm(filePath);
      return exclude.some((re) => re.test(n));
    },
    matchesPattern(filePath) {
      if (!patternRe) return true;
      const n = norm(filePath);
      return patternRe.test(patternOnBasename ? path.posix.basename(n) : n);
    },
  };
}

/**
 * Picks the files worth sending to the model. Entries are taken in path order so
 * the file and byte caps cut the same files every time.
 */
export function selectFiles<T extends { path: string; size?: number }>(
  entries: T[],
  policy: FilePolicy
): { selected: T[]; skipped: SkippedFile[] } {
  const selected: T[] = [];
  const skipped: SkippedFile[] = [];
  let total = 0;

  const sorted = [...entries].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  for (const entry of sorted) {
    const size = entry.size ?? 0;
    let reason: SkipReason | null = null;
    if (!policy.matchesPattern(entry.path)) reason = 'pattern';
    else if (policy.isExcluded(entry.path) || !policy.accepts(entry.path)) reason = 'excluded';
    else if (size > policy.maxFileSize) reason = 'too_large';
    else if (selected.length >= policy.maxFiles || total + size > policy.maxTotalBytes) reason = 'budget';

    if (reason) {
      skipped.push({ path: entry.path, reason });
      continue;
    }
    selected.push(entry);
    total += size;
  }
  return { selected, skipped };
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** UTF-8 text, or null for content that looks binary. */
export function decodeText(buf: Buffer): string | null {
  if (buf.includes(0)) return null;
  try {
    return utf8.decode(buf);
  } catch {
    return null;
  }
}
