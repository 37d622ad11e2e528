// src/routes/update.ts
import { Router, type Request, type Response } from 'express';
import { asyncHandler, requestSignal } from '../lib/http';
import { validateUpdateRequest, type RepoUpdater } from '../services/updater';

const EXCERPT_CHARS = 500;

function excerpt(s: string): string {
  return s.length > EXCERPT_CHARS ? s.slice(0, EXCERPT_CHARS) + '...' : s;
}

export function updateRoutes(updater: RepoUpdater): Router {
  const router = Router();

  // UPDATE: read -> generate -> commit on a new branch
  router.post(
    '/update-repo',
    asyncHandler(async (req: Request, res: Response) => {
      const body = validateUpdateRequest(req.body, updater.limits);
      const { result, summary } = await updater.update(body, requestSignal(req));

      const n = result.filesChanged.length;
      res.json({
        success: true,
        branch: result.commits === 0 ? null : result.branch,
        commits: result.commits,
        files_changed: result.filesChanged,
        commit_sha: result.commitSha,
        message:
          result.commits === 0
            ? "No changes were made. The AI didn't find any files to update based on your prompt."
            : `Successfully created branch '${result.branch}' with ${n} file change${n === 1 ? '' : 's'}`,
        ...(summary ? { summary } : {}),
      });
    })
  );

  // PREVIEW: read -> generate, nothing written
  router.post(
    '/preview-changes',
    asyncHandler(async (req: Request, res: Response) => {
      const body = validateUpdateRequest(req.body, updater.limits);
      const { changeSet, snapshot } = await updater.preview(body, requestSignal(req));
      const before = new Map(snapshot.files.map((f) => [f.path, f.content]));

      res.json({
        success: true,
        files_to_update: changeSet.changes.length,
        changes: changeSet.changes.map((c) => ({
          path: c.path,
          created: c.created,
          original: excerpt(before.get(c.path) ?? ''),
          updated: excerpt(c.content),
        })),
        skipped: snapshot.skipped,
        ...(changeSet.summary ? { summary: changeSet.summary } : {}),
      });
    })
  );

  return router;
}
