import { describe, it, expect, beforeEach } from 'vitest';
import { InputValidationError, NotFoundError, ParseError } from '../src/lib/errors';
import { createUpdater } from '../src/services';
import { commitMessage, generateBranchName, validateUpdateRequest, type RepoUpdater } from '../src/services/updater';
import { testEnv } from './helpers/env';
import { changesReply, fakeAnthropic, messageReply } from './helpers/fake-anthropic';
import { FakeGitHub } from './helpers/fake-github';

const limits = { githubHost: 'github.com', maxPromptChars: 100, maxTokensLimit: 64_000 };
const BRANCH_RE = /^feature\/ai-updates-\d{8}-\d{6}-[0-9a-f]{6}$/;

function request(overrides: Record<string, unknown> = {}) {
  return validateUpdateRequest(
    { repo_url: 'https://github.com/acme/widgets', prompt: 'add null checks', base_branch: 'main', ...overrides },
    limits
  );
}

describe('generateBranchName', () => {
  it('stamps the UTC time and a random hex suffix', () => {
    const name = generateBranchName(new Date(Date.UTC(2025, 0, 2, 3, 4, 5)));
    expect(name).toMatch(/^feature\/ai-updates-20250102-030405-[0-9a-f]{6}$/);
  });

  it('differs between two calls in the same second', () => {
    const at = new Date(Date.UTC(2025, 0, 2, 3, 4, 5));
    const names = new Set(Array.from({ length: 20 }, () => generateBranchName(at)));
    expect(names.size).toBeGreaterThan(1);
  });
});

describe('commitMessage', () => {
  it('keeps short prompts whole', () => {
    expect(commitMessage('add null checks')).toBe('AI Update: add null checks');
  });

  it('truncates at 50 characters and collapses whitespace', () => {
    const prompt = 'a'.repeat(30) + '\n\n' + 'b'.repeat(30);
    expect(commitMessage(prompt)).toBe(`AI Update: ${'a'.repeat(30)} ${'b'.repeat(19)}...`);
  });
});

describe('validateUpdateRequest', () => {
  it('fills defaults', () => {
    const req = validateUpdateRequest({ repo_url: 'https://github.com/acme/widgets', prompt: 'x' }, limits);
    expect(req.base_branch).toBe('main');
    expect(req.create_files).toEqual([]);
    expect(req.new_branch).toBeUndefined();
  });

  it.each([
    [{ prompt: 'x' }, 'repo_url'],
    [{ repo_url: 'https://github.com/acme/widgets' }, 'prompt'],
    [{ repo_url: 'https://github.com/acme/widgets', prompt: '' }, 'prompt'],
    [{ repo_url: 'https://github.com/acme/widgets', prompt: 'x'.repeat(101) }, 'prompt'],
    [{ repo_url: 'https://github.com/acme/widgets', prompt: 'x', max_tokens: 100_000 }, 'max_tokens'],
    [{ repo_url: 'https://github.com/acme/widgets', prompt: 'x', new_branch: 'bad..name' }, 'new_branch'],
    [{ repo_url: 'https://github.com/acme/widgets', prompt: 'x', create_files: ['../etc/passwd'] }, 'create_files'],
  ])('rejects %j on %s', (body, field) => {
    try {
      validateUpdateRequest(body, limits);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InputValidationError);
      if (!(err instanceof InputValidationError)) return;
      expect(err.details?.map((d) => d.path[0])).toContain(field);
    }
  });
});

describe('RepoUpdater', () => {
  let gh: FakeGitHub;

  beforeEach(() => {
    gh = new FakeGitHub();
    gh.addRepo('acme', 'widgets', {
      'app.py': 'def f(x):\n    return x.y\n',
      'README.md': '# widgets\n',
    });
  });

  function updater(...replies: Parameters<typeof fakeAnthropic>): { updater: RepoUpdater; ai: ReturnType<typeof fakeAnthropic> } {
    const ai = fakeAnthropic(...replies);
    return { updater: createUpdater(testEnv(), { githubFetch: gh.fetch, aiFetch: ai.fetch }), ai };
  }

  it('reads, generates and commits on a new generated branch', async () => {
    const updated = 'def f(x):\n    if x is None:\n        return None\n    return x.y\n';
    const { updater: u, ai } = updater(changesReply([{ path: 'app.py', content: updated }], 'Guard against None'));

    const { result, summary } = await u.update(request());

    expect(result.success).toBe(true);
    expect(result.commits).toBe(1);
    expect(result.filesChanged).toEqual(['app.py']);
    expect(result.branch).toMatch(BRANCH_RE);
    expect(summary).toBe('Guard against None');
    expect(gh.ref('acme', 'widgets', result.branch)).toBe(result.commitSha);
    expect(gh.filesAt('acme', 'widgets', result.branch)).toEqual({
      'app.py': updated,
      'README.md': '# widgets\n',
    });
    expect(gh.commit('acme', 'widgets', result.commitSha ?? '')?.message).toBe('AI Update: add null checks');

    expect(ai.calls).toHaveLength(1);
    const sent = ai.calls[0].body.messages[0].content;
    expect(sent).toContain('<file path="app.py">\ndef f(x):\n    return x.y\n\n</file>');
    expect(sent).toContain('<file path="README.md">\n# widgets\n\n</file>');
  });

  it('creates a different branch on each run', async () => {
    const { updater: u } = updater(changesReply([{ path: 'app.py', content: 'pass\n' }]));
    const first = await u.update(request());
    const second = await u.update(request());
    expect(first.result.branch).not.toBe(second.result.branch);
    expect(second.result.commits).toBe(1);
  });

  it('uses the requested branch name', async () => {
    const { updater: u } = updater(changesReply([{ path: 'app.py', content: 'pass\n' }]));
    const { result } = await u.update(request({ new_branch: 'fix/null-checks' }));
    expect(result.branch).toBe('fix/null-checks');
    expect(gh.ref('acme', 'widgets', 'fix/null-checks')).toBe(result.commitSha);
  });

  it('writes nothing when the model proposes no changes', async () => {
    const { updater: u } = updater(messageReply(''));
    const { result } = await u.update(request());
    expect(result.commits).toBe(0);
    expect(result.commitSha).toBeNull();
    expect(result.filesChanged).toEqual([]);
    expect(gh.writes).toEqual([]);
  });

  it('fails with NotFound and no writes or AI call when the base branch is missing', async () => {
    const { updater: u, ai } = updater(changesReply([]));
    await expect(u.update(request({ base_branch: 'develop' }))).rejects.toBeInstanceOf(NotFoundError);
    expect(gh.writes).toEqual([]);
    expect(ai.calls).toEqual([]);
  });

  it('rejects a change to a file it never sent and writes nothing', async () => {
    const { updater: u } = updater(changesReply([{ path: 'secrets.env', content: 'x' }]));
    await expect(u.update(request())).rejects.toBeInstanceOf(ParseError);
    expect(gh.writes).toEqual([]);
  });

  it('accepts a new file listed in create_files', async () => {
    const { updater: u } = updater(changesReply([{ path: 'tests/test_app.py', content: 'def test(): pass\n' }]));
    const { result } = await u.update(request({ create_files: ['tests/test_app.py'] }));
    expect(result.filesChanged).toEqual(['tests/test_app.py']);
    expect(gh.filesAt('acme', 'widgets', result.branch)['tests/test_app.py']).toBe('def test(): pass\n');
  });

  it('refuses to create a file that exists but was not sent to the model', async () => {
    gh.addRepo('acme', 'tools', {
      'app.py': 'print(1)\n',
      'deploy.sh': { content: 'echo deploy\n', mode: '100755' },
    });
    const { updater: u, ai } = updater(changesReply([{ path: 'deploy.sh', content: 'echo replaced\n' }]));
    const err = await u
      .update(
        request({ repo_url: 'https://github.com/acme/tools', file_pattern: '*.py', create_files: ['deploy.sh'] })
      )
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InputValidationError);
    expect(err).toHaveProperty('message', 'create_files conflicts with the base tree');
    expect(err).toHaveProperty('details', [{ path: ['create_files', 0], message: '"deploy.sh" already exists in main' }]);
    expect(ai.calls).toEqual([]);
    expect(gh.writes).toEqual([]);
  });

  it('refuses create_files entries that are directories or sit under a file', async () => {
    gh.addRepo('acme', 'tools', { 'lib/util.py': 'X = 1\n', 'app.py': 'print(1)\n' });
    const { updater: u } = updater(changesReply([]));
    const err = await u
      .update(request({ repo_url: 'https://github.com/acme/tools', create_files: ['lib', 'app.py/extra.py'] }))
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InputValidationError);
    expect(err).toHaveProperty('details', [
      { path: ['create_files', 0], message: '"lib" is a directory in main' },
      { path: ['create_files', 1], message: '"app.py" is not a directory in main' },
    ]);
  });

  it('keeps the executable mode of a changed file', async () => {
    gh.addRepo('acme', 'tools', { 'run.sh': { content: 'echo hi\n', mode: '100755' } });
    const { updater: u } = updater(changesReply([{ path: 'run.sh', content: 'echo bye\n' }]));
    const plan = await u.preview(request({ repo_url: 'https://github.com/acme/tools' }));
    const { result } = await u.apply(plan, 'say bye');
    const commit = gh.commit('acme', 'tools', result.commitSha ?? '');
    expect(gh.tree('acme', 'tools', commit?.tree ?? '').get('run.sh')?.mode).toBe('100755');
  });

  it('previews without writing', async () => {
    const { updater: u } = updater(changesReply([{ path: 'app.py', content: 'pass\n' }]));
    const plan = await u.preview(request());
    expect(plan.branch).toMatch(BRANCH_RE);
    expect(plan.changeSet.changes).toEqual([{ path: 'app.py', content: 'pass\n', created: false }]);
    expect(gh.writes).toEqual([]);
  });

  it('skips the AI call when the pattern selects nothing', async () => {
    const { updater: u, ai } = updater(changesReply([]));
    const { result } = await u.update(request({ file_pattern: '*.go' }));
    expect(result.commits).toBe(0);
    expect(ai.calls).toEqual([]);
  });
});
