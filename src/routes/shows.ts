import { Router, Request, Response } from 'express';
import { FormValidationError, ShowNotFoundError, ShowSettingsError } from '../errors';
import { formatWordList, isReleaseAcceptable, matchNamesForShow, releaseRejection } from '../filters/wordLists';
import { parseEditShowForm } from '../forms/editShowForm';
import indexerClient, { IndexerClient } from '../indexer/client';
import { settingsModel } from '../models/settings';
import { formHints, namingPolicyOf, numberingScheme } from '../naming/namingPolicy';
import {
  QUALITY_NAMES,
  QUALITY_PRESETS,
  QUALITY_TIERS,
  describeQuality,
  presetForQuality,
  splitQuality,
} from '../quality/qualities';
import { SearchPriority, SearchQueue, searchQueue } from '../services/searchQueue';
import showSettingsService, { ShowSettingsService, effectiveSettings } from '../services/showSettingsService';
import { EPISODE_STATUSES } from '../types/Show';

function parseShowId(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const id = parseInt(raw, 10);
  return id > 0 ? id : null;
}

function errorBody(error: unknown) {
  if (error instanceof FormValidationError) {
    return { error: error.message, code: error.code, fields: error.fields };
  }
  if (error instanceof ShowSettingsError) {
    return { error: error.message, code: error.code };
  }
  return { error: 'Internal server error', code: 'INTERNAL' };
}

function statusOf(error: unknown): number {
  return error instanceof ShowSettingsError ? error.status : 500;
}

// Best effort, for re-rendering a form that failed to parse
function submittedShowId(body: unknown): number | null {
  if (typeof body === 'object' && body !== null && 'show' in body && typeof body.show === 'string') {
    return parseShowId(body.show);
  }
  return null;
}

function readField(body: unknown, field: string): string {
  if (typeof body === 'object' && body !== null && field in body) {
    const value: unknown = Reflect.get(body, field);
    return typeof value === 'string' ? value.trim() : '';
  }
  return '';
}

export function createShowsRouter(
  service: ShowSettingsService = showSettingsService,
  indexer: Pick<IndexerClient, 'getLanguages'> = indexerClient,
  queue: SearchQueue = searchQueue
): Router {
  const router = Router();

  async function renderEdit(
    res: Response,
    showId: number,
    options: { status?: number; error?: string; fieldErrors?: Record<string, string>; saved?: boolean } = {}
  ) {
    const stored = service.loadForShow(showId);
    const policy = settingsModel.getGlobalPolicy();
    const show = effectiveSettings(stored, policy);
    const languages = await indexer.getLanguages();

    res.status(options.status ?? 200).render('editShow', {
      show,
      quality: splitQuality(show.quality),
      qualityPreset: presetForQuality(show.quality) ?? 'custom',
      qualityDescription: describeQuality(show.quality),
      qualityTiers: QUALITY_TIERS,
      qualityNames: QUALITY_NAMES,
      qualityPresets: Object.keys(QUALITY_PRESETS),
      episodeStatuses: EPISODE_STATUSES,
      languages,
      numbering: numberingScheme(show),
      hints: formHints(namingPolicyOf(show), policy),
      ignoreWords: formatWordList(show.ignoreWords),
      requireWords: formatWordList(show.requireWords),
      error: options.error ?? null,
      fieldErrors: options.fieldErrors ?? {},
      saved: options.saved ?? false,
    });
  }

  function renderError(res: Response, status: number, message: string) {
    res.status(status).render('error', { status, message });
  }

  router.get('/', (req: Request, res: Response) => {
    try {
      res.json({ shows: service.listShows() });
    } catch (error) {
      console.error('List shows error:', error);
      res.status(500).json(errorBody(error));
    }
  });

  router.post('/', async (req: Request, res: Response) => {
    const body: Record<string, unknown> = typeof req.body === 'object' && req.body !== null ? req.body : {};
    const indexerId = parseShowId(String(body.indexer_id ?? ''));
    const name = typeof body.name === 'string' ? body.name.trim() : '';
    const location = typeof body.location === 'string' ? body.location : '';
    const language = typeof body.indexerLang === 'string' && body.indexerLang.trim() ? body.indexerLang.trim() : undefined;

    const fields: Record<string, string> = {};
    if (!indexerId) fields.indexer_id = 'must be a show id';
    if (!name) fields.name = 'is required';
    if (!location.trim()) fields.location = 'is required';

    try {
      if (!indexerId || Object.keys(fields).length > 0) {
        throw new FormValidationError(fields);
      }
      const show = await service.addShow({ indexerId, name, location, language });
      res.status(201).json({ success: true, show });
    } catch (error) {
      if (statusOf(error) >= 500) console.error('Add show error:', error);
      res.status(statusOf(error)).json(errorBody(error));
    }
  });

  router.get('/:id', (req: Request, res: Response) => {
    const showId = parseShowId(req.params.id);
    if (!showId) {
      return res.status(400).json({ error: 'Invalid show id', code: 'VALIDATION' });
    }
    try {
      const show = service.loadForShow(showId);
      res.json({
        show,
        effective: effectiveSettings(show, settingsModel.getGlobalPolicy()),
        qualityDescription: describeQuality(show.quality),
      });
    } catch (error) {
      if (statusOf(error) >= 500) console.error('Get show error:', error);
      res.status(statusOf(error)).json(errorBody(error));
    }
  });

  router.delete('/:id', async (req: Request, res: Response) => {
    const showId = parseShowId(req.params.id);
    if (!showId) {
      return res.status(400).json({ error: 'Invalid show id', code: 'VALIDATION' });
    }
    try {
      await service.removeShow(showId);
      queue.removeShow(showId);
      res.json({ success: true, message: 'Show removed' });
    } catch (error) {
      if (statusOf(error) >= 500) console.error('Remove show error:', error);
      res.status(statusOf(error)).json(errorBody(error));
    }
  });

  router.get('/:id/edit', async (req: Request, res: Response) => {
    const showId = parseShowId(req.params.id);
    if (!showId) {
      return renderError(res, 400, 'Invalid show id');
    }
    try {
      await renderEdit(res, showId, { saved: req.query.saved === '1' });
    } catch (error) {
      if (error instanceof ShowNotFoundError) {
        return renderError(res, 404, error.message);
      }
      console.error('Edit show page error:', error);
      renderError(res, 500, 'Internal server error');
    }
  });

  router.post('/edit', async (req: Request, res: Response) => {
    let showId = submittedShowId(req.body);
    try {
      const submission = parseEditShowForm(req.body);
      showId = submission.showId;
      await service.applyUpdate(submission.showId, submission.update, settingsModel.getGlobalPolicy());
      res.redirect(303, `/shows/${submission.showId}/edit?saved=1`);
    } catch (error) {
      if (error instanceof ShowNotFoundError) {
        return renderError(res, 404, error.message);
      }
      if (!(error instanceof ShowSettingsError) || error.status >= 500) {
        console.error('Edit show error:', error);
      }

      // Field problems go back to the form; nothing was saved
      const message = error instanceof ShowSettingsError && error.status < 500 ? error.message : 'Failed to save show settings';
      if (showId === null) {
        return renderError(res, statusOf(error), message);
      }
      try {
        await renderEdit(res, showId, {
          status: statusOf(error),
          error: message,
          fieldErrors: error instanceof FormValidationError ? error.fields : {},
        });
      } catch (renderFailure) {
        console.error('Edit show re-render error:', renderFailure);
        renderError(res, statusOf(error), message);
      }
    }
  });

  router.post('/:id/exceptions', async (req: Request, res: Response) => {
    const showId = parseShowId(req.params.id);
    const name = readField(req.body, 'name');
    try {
      if (!showId) throw new FormValidationError({ show: 'must be a show id' });
      if (!name) throw new FormValidationError({ name: 'is required' });
      const result = await service.addSceneException(showId, name);
      res.json({
        success: true,
        added: result.changedFields.length > 0,
        sceneExceptions: result.show.sceneExceptions,
      });
    } catch (error) {
      if (statusOf(error) >= 500) console.error('Add scene exception error:', error);
      res.status(statusOf(error)).json(errorBody(error));
    }
  });

  router.post('/:id/exceptions/remove', async (req: Request, res: Response) => {
    const showId = parseShowId(req.params.id);
    const name = readField(req.body, 'name');
    try {
      if (!showId) throw new FormValidationError({ show: 'must be a show id' });
      if (!name) throw new FormValidationError({ name: 'is required' });
      const result = await service.removeSceneException(showId, name);
      res.json({
        success: true,
        removed: result.changedFields.length > 0,
        sceneExceptions: result.show.sceneExceptions,
      });
    } catch (error) {
      if (statusOf(error) >= 500) console.error('Remove scene exception error:', error);
      res.status(statusOf(error)).json(errorBody(error));
    }
  });

  router.post('/:id/search', (req: Request, res: Response) => {
    const showId = parseShowId(req.params.id);
    if (!showId) {
      return res.status(400).json({ error: 'Invalid show id', code: 'VALIDATION' });
    }
    try {
      service.loadForShow(showId);
      const item = queue.put(showId, 'manual', SearchPriority.HIGH);
      if (!item) {
        return queue.isPausedShow(showId)
          ? res.status(409).json({ error: `Show ${showId} is paused`, code: 'PAUSED' })
          : res.status(409).json({ error: `A manual search for show ${showId} is already queued`, code: 'ALREADY_QUEUED' });
      }
      res.status(202).json({ success: true, queued: item, queueSize: queue.size });
    } catch (error) {
      if (statusOf(error) >= 500) console.error('Queue search error:', error);
      res.status(statusOf(error)).json(errorBody(error));
    }
  });

  // Would the show's word lists let this release through?
  router.post('/:id/releases/check', (req: Request, res: Response) => {
    const showId = parseShowId(req.params.id);
    const release = readField(req.body, 'release');
    try {
      if (!showId) throw new FormValidationError({ show: 'must be a show id' });
      if (!release) throw new FormValidationError({ release: 'is required' });
      const show = service.loadForShow(showId);
      res.json({
        release,
        acceptable: isReleaseAcceptable(release, show),
        rejection: releaseRejection(release, show),
        matchNames: matchNamesForShow(show),
      });
    } catch (error) {
      if (statusOf(error) >= 500) console.error('Release check error:', error);
      res.status(statusOf(error)).json(errorBody(error));
    }
  });

  return router;
}

export default createShowsRouter();
