import type { Server } from 'node:http';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createApp } from '../src/app';
import { createUpdater } from '../src/services';
import type { FetchLike } from '../src/services/change-generator';
import { testEnv } from './helpers/env';
import { changesReply, fakeAnthropic, type Reply } from './helpers/fake-anthropic';
import { FakeGitHub } from './helpers/fake-github';

describe('HTTP API', () => {
  let gh: FakeGitHub;
  let server: Server | undefined;
  let baseUrl: string;

  async function start(reply: Reply, env: Record<string, string> = {}) {
    const ai = fakeAnthropic(reply);
    await listen(ai.fetch, env);
    return ai;
  }

  async function listen(aiFetch: FetchLike, env: Record<string, string> = {}) {
    const config = testEnv(env);
    const app = createApp({ env: config, updater: createUpdater(config, { githubFetch: gh.fetch, aiFetch }) });
    const listening = app.listen(0);
    server = listening;
    await new Promise<void>((resolve) => listening.once('listening', () => resolve()));
    const address = listening.address();
    if (!address || typeof address === 'string') throw new Error('server has no TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  /** A model call that never answers; settles only when its signal aborts. */
  function stalledModel() {
    const signals: AbortSignal[] = [];
    let markCalled: () => void = () => undefined;
    let markAborted: () => void = () => undefined;
    const called = new Promise<void>((resolve) => (markCalled = resolve));
    const aborted = new Promise<void>((resolve) => (markAborted = resolve));
    const fetch: FetchLike = (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        const { signal } = init;
        if (signal) {
          signals.push(signal);
          signal.addEventListener('abort', () => {
            markAborted();
            reject(signal.reason);
          });
        }
        markCalled();
      });
    return { fetch, signals, called, aborted };
  }

  function post(path: string, body: unknown, headers: Record<string, string> = {}, signal?: AbortSignal) {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', ...headers },
      body: typeof body === 'string' ? body : JSON.stringify(body),
      signal,
    });
  }

  beforeEach(() => {
    gh = new FakeGitHub();
    gh.addRepo('acme', 'widgets', { 'app.py': 'def f(x):\n    return x.y\n' });
  });

  afterEach(async () => {
    const running = server;
    server = undefined;
    if (running) await new Promise<void>((resolve, reject) => running.close((err) => (err ? reject(err) : resolve())));
  });

  it('creates a branch and reports the commit', async () => {
    await start(changesReply([{ path: 'app.py', content: 'pass\n' }]));
    const res = await post('/api/update-repo', { repo_url: 'https://github.com/acme/widgets', prompt: 'add null checks' });
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.success).toBe(true);
    expect(body.commits).toBe(1);
    expect(body.files_changed).toEqual(['app.py']);
    expect(body.branch).toMatch(/^feature\/ai-updates-\d{8}-\d{6}-[0-9a-f]{6}$/);
    expect(body.commit_sha).toBe(gh.ref('acme', 'widgets', body.branch));
    expect(body.message).toBe(`Successfully created branch '${body.branch}' with 1 file change`);
  });

  it('reports a no-op when the model changes nothing', async () => {
    await start(changesReply([]));
    const res = await post('/api/update-repo', { repo_url: 'https://github.com/acme/widgets', prompt: 'x' });
    const body = await res.json();
    expect(res.status).toBe(200);
    expect(body).toMatchObject({ success: true, branch: null, commits: 0, files_changed: [], commit_sha: null });
    expect(body.message).toBe("No changes were made. The AI didn't find any files to update based on your prompt.");
  });

  it('rejects an invalid body with 400 and field details', async () => {
    await start(changesReply([]));
    const res = await post('/api/update-repo', { prompt: 'x' });
    expect(res.status).toBe(400);
    const body = await res.json();
    expect(body.success).toBe(false);
    expect(body.error).toBe('invalid_input');
    expect(body.details[0].path).toEqual(['repo_url']);
  });

  it('rejects a non-GitHub URL with 400', async () => {
    await start(changesReply([]));
    const res = await post('/api/update-repo', { repo_url: 'https://gitlab.com/acme/widgets', prompt: 'x' });
    expect(res.status).toBe(400);
    expect((await res.json()).error).toBe('invalid_input');
  });

  it('rejects malformed JSON with 400', async () => {
    await start(changesReply([]));
    const res = await post('/api/update-repo', '{"repo_url":');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      success: false,
      error: 'invalid_input',
      message: 'Request body is not valid JSON',
    });
  });

  it('maps a missing branch to 404', async () => {
    await start(changesReply([]));
    const res = await post('/api/update-repo', {
      repo_url: 'https://github.com/acme/widgets',
      prompt: 'x',
      base_branch: 'develop',
    });
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      success: false,
      error: 'not_found',
      message: "Branch 'develop' in acme/widgets not found",
    });
  });

  it('maps an existing target branch to 409', async () => {
    gh.moveRef('acme', 'widgets', 'taken', gh.ref('acme', 'widgets', 'main') ?? '');
    await start(changesReply([{ path: 'app.py', content: 'pass\n' }]));
    const res = await post('/api/update-repo', {
      repo_url: 'https://github.com/acme/widgets',
      prompt: 'x',
      new_branch: 'taken',
    });
    expect(res.status).toBe(409);
    expect((await res.json()).error).toBe('conflict');
  });

  it('maps a rejected model response to 502', async () => {
    await start(changesReply([{ path: 'other.py', content: 'x' }]));
    const res = await post('/api/update-repo', { repo_url: 'https://github.com/acme/widgets', prompt: 'x' });
    expect(res.status).toBe(502);
    expect((await res.json()).error).toBe('parse_error');
    expect(gh.writes).toEqual([]);
  });

  it('previews changes without writing', async () => {
    await start(changesReply([{ path: 'app.py', content: 'pass\n' }], 'Simplify'));
    const res = await post('/api/preview-changes', { repo_url: 'https://github.com/acme/widgets', prompt: 'x' });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      files_to_update: 1,
      changes: [{ path: 'app.py', created: false, original: 'def f(x):\n    return x.y\n', updated: 'pass\n' }],
      skipped: [],
      summary: 'Simplify',
    });
    expect(gh.writes).toEqual([]);
  });

  it('requires the API token when one is configured', async () => {
    await start(changesReply([]), { UPDATER_API_TOKEN: 'test-secret' });
    const denied = await post('/api/update-repo', { repo_url: 'https://github.com/acme/widgets', prompt: 'x' });
    expect(denied.status).toBe(401);
    expect((await denied.json()).error).toBe('unauthorized');

    const allowed = await post(
      '/api/update-repo',
      { repo_url: 'https://github.com/acme/widgets', prompt: 'x' },
      { 'X-Updater-Token': 'test-secret' }
    );
    expect(allowed.status).toBe(200);
  });

  it('reports health without secrets', async () => {
    await start(changesReply([]));
    const res = await fetch(`${baseUrl}/health`);
    const body = await res.json();
    expect(body).toMatchObject({ status: 'healthy', github_token_set: true, anthropic_key_set: true });
    expect(JSON.stringify(body)).not.toContain('test-token');
  });

  it('answers unknown routes with JSON 404', async () => {
    await start(changesReply([]));
    const res = await fetch(`${baseUrl}/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ success: false, error: 'not_found', message: 'No route for GET /nope' });
  });

  it('answers 504 and cancels the model call when the request times out', async () => {
    const model = stalledModel();
    await listen(model.fetch, { REQUEST_TIMEOUT_MS: '200' });
    const res = await post('/api/update-repo', { repo_url: 'https://github.com/acme/widgets', prompt: 'x' });

    expect(res.status).toBe(504);
    expect(await res.json()).toEqual({ success: false, error: 'timeout', message: 'Request exceeded 200ms' });
    await model.aborted;
    expect(model.signals).toHaveLength(1);
    expect(model.signals[0].aborted).toBe(true);
    expect(gh.writes).toEqual([]);
  });

  it('cancels the model call when the client disconnects', async () => {
    const model = stalledModel();
    await listen(model.fetch);
    const client = new AbortController();
    const pending = post(
      '/api/update-repo',
      { repo_url: 'https://github.com/acme/widgets', prompt: 'x' },
      {},
      client.signal
    ).catch((e: unknown) => e);

    await model.called;
    client.abort();
    expect(await pending).toHaveProperty('name', 'AbortError');
    await model.aborted;
    expect(model.signals[0].aborted).toBe(true);
    expect(gh.writes).toEqual([]);
  });
});
