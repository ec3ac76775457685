import db from '../db';
import { config } from '../config';
import {
  PersistenceError,
  ShowAlreadyExistsError,
  ShowNotFoundError,
  ShowSettingsError,
  UnsupportedLanguageError,
} from '../errors';
import indexerClient, { LanguageSource } from '../indexer/client';
import { sceneExceptionsModel } from '../models/sceneExceptions';
import { settingsModel } from '../models/settings';
import { showsModel } from '../models/shows';
import { resolveSeasonFolders } from '../naming/namingPolicy';
import { combineQualities } from '../quality/qualities';
import {
  GlobalPolicy,
  NewShowInput,
  ShowDefaults,
  ShowSettings,
  ShowSettingsField,
  ShowUpdateRequest,
  ShowState,
} from '../types/Show';
import { checkShowLocation } from '../utils/locationCheck';
import { withTimeout } from '../utils/withTimeout';
import { settingsEvents } from './settingsEvents';
import { withShowLock } from './showLocks';
import { logger } from './structuredLogging';

export interface ShowUpdateResult {
  show: ShowSettings;
  changedFields: ShowSettingsField[];
}

export interface ShowSettingsServiceOptions {
  languages?: LanguageSource;
  timeoutMs?: number;
  checkLocation?: (location: string, timeoutMs: number) => Promise<string>;
}

export const UPDATABLE_FIELDS: readonly ShowSettingsField[] = [
  'location',
  'quality',
  'defaultEpisodeStatus',
  'language',
  'skipDownloaded',
  'subtitlesEnabled',
  'subtitlesUseShowMetadata',
  'paused',
  'airByDate',
  'sports',
  'dvdOrder',
  'isAnime',
  'sceneNumbering',
  'seasonFolders',
  'ignoreWords',
  'requireWords',
  'sceneExceptions',
  'searchDelayDays',
];

function sameWords(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((word, index) => word === b[index]);
}

function sameNameSet(a: readonly string[], b: readonly string[]): boolean {
  const left = new Set(a.map((name) => name.toLowerCase()));
  const right = new Set(b.map((name) => name.toLowerCase()));
  return left.size === right.size && [...left].every((name) => right.has(name));
}

function dedupeNames(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const name of names) {
    const key = name.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      result.push(name);
    }
  }
  return result;
}

export function diffShow(previous: ShowSettings, next: ShowSettings): ShowSettingsField[] {
  return UPDATABLE_FIELDS.filter((field) => {
    switch (field) {
      case 'ignoreWords':
      case 'requireWords':
        return !sameWords(previous[field], next[field]);
      case 'sceneExceptions':
        return !sameNameSet(previous.sceneExceptions, next.sceneExceptions);
      default:
        return previous[field] !== next[field];
    }
  });
}

export function showState(show: Pick<ShowSettings, 'paused'>): ShowState {
  return show.paused ? 'PAUSED' : 'ACTIVE';
}

/** The show as the rest of the app must treat it, with global overrides applied. */
export function effectiveSettings(show: ShowSettings, policy: GlobalPolicy): ShowSettings {
  return {
    ...show,
    subtitlesEnabled: show.subtitlesEnabled && policy.useSubtitles,
    seasonFolders: resolveSeasonFolders(show.seasonFolders, policy),
  };
}

/**
 * Merge a request into the stored show. Pure: location and language are
 * validated by the caller.
 */
export function mergeUpdate(current: ShowSettings, request: ShowUpdateRequest, policy: GlobalPolicy): ShowSettings {
  return {
    ...current,
    location: request.location ?? current.location,
    quality: request.quality ? combineQualities(request.quality.initial, request.quality.upgrade) : current.quality,
    defaultEpisodeStatus: request.defaultEpisodeStatus ?? current.defaultEpisodeStatus,
    language: request.language ?? current.language,
    skipDownloaded: request.skipDownloaded ?? current.skipDownloaded,
    // Not settable per show while subtitles are off app-wide; keep what was stored
    subtitlesEnabled: policy.useSubtitles
      ? request.subtitlesEnabled ?? current.subtitlesEnabled
      : current.subtitlesEnabled,
    subtitlesUseShowMetadata: request.subtitlesUseShowMetadata ?? current.subtitlesUseShowMetadata,
    paused: request.paused ?? current.paused,
    airByDate: request.airByDate ?? current.airByDate,
    sports: request.sports ?? current.sports,
    dvdOrder: request.dvdOrder ?? current.dvdOrder,
    isAnime: request.isAnime ?? current.isAnime,
    sceneNumbering: request.sceneNumbering ?? current.sceneNumbering,
    seasonFolders: resolveSeasonFolders(request.seasonFolders ?? current.seasonFolders, policy),
    ignoreWords: request.ignoreWords ? [...request.ignoreWords] : current.ignoreWords,
    requireWords: request.requireWords ? [...request.requireWords] : current.requireWords,
    sceneExceptions: request.sceneExceptions ? dedupeNames(request.sceneExceptions) : current.sceneExceptions,
    searchDelayDays: request.searchDelayDays ?? current.searchDelayDays,
  };
}

export class ShowSettingsService {
  private readonly languages: LanguageSource;
  private readonly timeoutMs: number;
  private readonly checkLocation: (location: string, timeoutMs: number) => Promise<string>;

  constructor(options: ShowSettingsServiceOptions = {}) {
    this.languages = options.languages ?? indexerClient;
    this.timeoutMs = options.timeoutMs ?? config.ioTimeoutMs;
    this.checkLocation = options.checkLocation ?? checkShowLocation;
  }

  listShows(): ShowSettings[] {
    return showsModel.getAll();
  }

  loadForShow(showId: number): ShowSettings {
    const show = showsModel.getById(showId);
    if (!show) {
      throw new ShowNotFoundError(showId);
    }
    return show;
  }

  private async assertLanguageSupported(language: string): Promise<void> {
    const supported = await withTimeout(this.languages.supportedLanguages(), this.timeoutMs, 'Fetching indexer languages');
    if (!supported.has(language)) {
      throw new UnsupportedLanguageError(language);
    }
  }

  private async resolveLocation(location: string): Promise<string> {
    return withTimeout(this.checkLocation(location, this.timeoutMs), this.timeoutMs, 'Checking show location');
  }

  private persist<T>(showId: number, operation: string, write: () => T): T {
    try {
      return db.transaction(write)();
    } catch (error) {
      if (error instanceof ShowSettingsError) throw error;
      logger.error('shows', `${operation} failed for show ${showId}`, {
        showId,
        details: { error: error instanceof Error ? error.message : String(error) },
      });
      throw new PersistenceError(`Failed to save show ${showId}`, error);
    }
  }

  private notify(previous: ShowSettings, current: ShowSettings, changedFields: ShowSettingsField[]): void {
    settingsEvents.emitChanged({ showId: current.indexerId, changedFields, previous, current });

    if (changedFields.includes('paused')) {
      logger.info('shows', `Show ${current.indexerId} is now ${showState(current)}`, { showId: current.indexerId });
    }
  }

  async applyUpdate(showId: number, request: ShowUpdateRequest, policy: GlobalPolicy): Promise<ShowUpdateResult> {
    return withShowLock(showId, this.timeoutMs, async () => {
      const current = this.loadForShow(showId);

      const location = request.location !== undefined ? await this.resolveLocation(request.location) : undefined;
      if (request.language !== undefined) {
        await this.assertLanguageSupported(request.language);
      }

      const next = mergeUpdate(current, { ...request, location }, policy);
      const changedFields = diffShow(current, next);

      if (changedFields.length === 0) {
        logger.debug('shows', `No changes for show ${showId}`, { showId });
        return { show: current, changedFields };
      }

      this.persist(showId, 'Update', () => {
        showsModel.update(next);
        if (changedFields.includes('sceneExceptions')) {
          this.reconcileSceneExceptions(showId, current.sceneExceptions, next.sceneExceptions);
        }
      });

      const stored = this.loadForShow(showId);
      logger.info('shows', `Updated show ${showId}`, { showId, details: { changedFields } });
      this.notify(current, stored, changedFields);
      return { show: stored, changedFields };
    });
  }

  // Submitted lists become individual adds and removes
  private reconcileSceneExceptions(showId: number, previous: readonly string[], next: readonly string[]): void {
    const wanted = new Set(next.map((name) => name.toLowerCase()));
    const existing = new Set(previous.map((name) => name.toLowerCase()));

    for (const name of previous) {
      if (!wanted.has(name.toLowerCase())) {
        sceneExceptionsModel.remove(showId, name);
      }
    }
    for (const name of next) {
      if (!existing.has(name.toLowerCase())) {
        sceneExceptionsModel.add(showId, name);
      }
    }
  }

  async addSceneException(showId: number, name: string): Promise<ShowUpdateResult> {
    return this.mutateSceneExceptions(showId, 'Add scene exception', () => sceneExceptionsModel.add(showId, name));
  }

  async removeSceneException(showId: number, name: string): Promise<ShowUpdateResult> {
    return this.mutateSceneExceptions(showId, 'Remove scene exception', () => sceneExceptionsModel.remove(showId, name));
  }

  private async mutateSceneExceptions(showId: number, operation: string, mutate: () => boolean): Promise<ShowUpdateResult> {
    return withShowLock(showId, this.timeoutMs, async () => {
      const current = this.loadForShow(showId);

      const changed = this.persist(showId, operation, mutate);
      if (!changed) {
        return { show: current, changedFields: [] };
      }

      const stored = this.loadForShow(showId);
      const changedFields: ShowSettingsField[] = ['sceneExceptions'];
      logger.info('shows', `${operation} for show ${showId}`, { showId, details: { sceneExceptions: stored.sceneExceptions } });
      this.notify(current, stored, changedFields);
      return { show: stored, changedFields };
    });
  }

  async addShow(
    input: NewShowInput,
    defaults: ShowDefaults = settingsModel.getShowDefaults(),
    policy: GlobalPolicy = settingsModel.getGlobalPolicy()
  ): Promise<ShowSettings> {
    return withShowLock(input.indexerId, this.timeoutMs, async () => {
      if (showsModel.exists(input.indexerId)) {
        throw new ShowAlreadyExistsError(input.indexerId);
      }

      const location = await this.resolveLocation(input.location);
      const language = input.language ?? defaults.language;
      await this.assertLanguageSupported(language);

      const show: ShowSettings = {
        indexerId: input.indexerId,
        name: input.name.trim(),
        location,
        quality: defaults.quality,
        defaultEpisodeStatus: defaults.defaultEpisodeStatus,
        language,
        skipDownloaded: false,
        subtitlesEnabled: defaults.subtitlesEnabled,
        subtitlesUseShowMetadata: false,
        paused: false,
        airByDate: false,
        sports: false,
        dvdOrder: false,
        isAnime: false,
        sceneNumbering: false,
        seasonFolders: resolveSeasonFolders(defaults.seasonFolders, policy),
        ignoreWords: [],
        requireWords: [],
        sceneExceptions: [],
        searchDelayDays: 0,
      };

      const stored = this.persist(input.indexerId, 'Add', () => showsModel.insert(show));

      logger.info('shows', `Added show ${input.indexerId} (${show.name})`, { showId: input.indexerId });
      return stored;
    });
  }

  async removeShow(showId: number): Promise<void> {
    return withShowLock(showId, this.timeoutMs, async () => {
      this.loadForShow(showId);
      this.persist(showId, 'Remove', () => {
        showsModel.remove(showId);
      });
      logger.info('shows', `Removed show ${showId}`, { showId });
    });
  }
}

const showSettingsService = new ShowSettingsService();

export default showSettingsService;
