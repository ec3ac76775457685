import db from '../db';
import { formatWordList, parseWordList } from '../filters/wordLists';
import { EpisodeStatus, ShowSettings, isEpisodeStatus } from '../types/Show';
import { sceneExceptionsModel } from './sceneExceptions';

interface ShowRow {
  indexer_id: number;
  show_name: string;
  location: string;
  quality: number;
  default_ep_status: string;
  lang: string;
  skip_downloaded: number;
  subtitles: number;
  subtitles_sr_metadata: number;
  paused: number;
  air_by_date: number;
  sports: number;
  dvd_order: number;
  anime: number;
  scene: number;
  season_folders: number;
  rls_ignore_words: string;
  rls_require_words: string;
  search_delay: number;
  added_at: string;
  updated_at: string;
}

function toEpisodeStatus(value: string): EpisodeStatus {
  return isEpisodeStatus(value) ? value : 'SKIPPED';
}

function convertShow(row: ShowRow): ShowSettings {
  return {
    indexerId: row.indexer_id,
    name: row.show_name,
    location: row.location,
    quality: row.quality,
    defaultEpisodeStatus: toEpisodeStatus(row.default_ep_status),
    language: row.lang,
    skipDownloaded: Boolean(row.skip_downloaded),
    subtitlesEnabled: Boolean(row.subtitles),
    subtitlesUseShowMetadata: Boolean(row.subtitles_sr_metadata),
    paused: Boolean(row.paused),
    airByDate: Boolean(row.air_by_date),
    sports: Boolean(row.sports),
    dvdOrder: Boolean(row.dvd_order),
    isAnime: Boolean(row.anime),
    sceneNumbering: Boolean(row.scene),
    seasonFolders: Boolean(row.season_folders),
    ignoreWords: parseWordList(row.rls_ignore_words),
    requireWords: parseWordList(row.rls_require_words),
    sceneExceptions: sceneExceptionsModel.getForShow(row.indexer_id),
    searchDelayDays: row.search_delay,
    addedAt: row.added_at,
    updatedAt: row.updated_at,
  };
}

function toParams(show: ShowSettings) {
  return {
    indexer_id: show.indexerId,
    show_name: show.name,
    location: show.location,
    quality: show.quality,
    default_ep_status: show.defaultEpisodeStatus,
    lang: show.language,
    skip_downloaded: show.skipDownloaded ? 1 : 0,
    subtitles: show.subtitlesEnabled ? 1 : 0,
    subtitles_sr_metadata: show.subtitlesUseShowMetadata ? 1 : 0,
    paused: show.paused ? 1 : 0,
    air_by_date: show.airByDate ? 1 : 0,
    sports: show.sports ? 1 : 0,
    dvd_order: show.dvdOrder ? 1 : 0,
    anime: show.isAnime ? 1 : 0,
    scene: show.sceneNumbering ? 1 : 0,
    season_folders: show.seasonFolders ? 1 : 0,
    rls_ignore_words: formatWordList(show.ignoreWords),
    rls_require_words: formatWordList(show.requireWords),
    search_delay: show.searchDelayDays,
  };
}

export const showsModel = {
  getAll: (): ShowSettings[] => {
    const rows = db.prepare('SELECT * FROM shows ORDER BY show_name COLLATE NOCASE').all() as ShowRow[];
    return rows.map(convertShow);
  },

  getById: (indexerId: number): ShowSettings | undefined => {
    const row = db.prepare('SELECT * FROM shows WHERE indexer_id = ?').get(indexerId) as ShowRow | undefined;
    return row ? convertShow(row) : undefined;
  },

  exists: (indexerId: number): boolean => {
    return Boolean(db.prepare('SELECT 1 FROM shows WHERE indexer_id = ?').get(indexerId));
  },

  insert: (show: ShowSettings): ShowSettings => {
    db.prepare(`
      INSERT INTO shows (
        indexer_id, show_name, location, quality, default_ep_status, lang,
        skip_downloaded, subtitles, subtitles_sr_metadata, paused,
        air_by_date, sports, dvd_order, anime, scene, season_folders,
        rls_ignore_words, rls_require_words, search_delay
      ) VALUES (
        @indexer_id, @show_name, @location, @quality, @default_ep_status, @lang,
        @skip_downloaded, @subtitles, @subtitles_sr_metadata, @paused,
        @air_by_date, @sports, @dvd_order, @anime, @scene, @season_folders,
        @rls_ignore_words, @rls_require_words, @search_delay
      )
    `).run(toParams(show));

    for (const name of show.sceneExceptions) {
      sceneExceptionsModel.add(show.indexerId, name);
    }

    const stored = showsModel.getById(show.indexerId);
    if (!stored) {
      throw new Error(`Show ${show.indexerId} missing after insert`);
    }
    return stored;
  },

  /** Scene exceptions are not written here, see sceneExceptionsModel. */
  update: (show: ShowSettings): void => {
    const result = db.prepare(`
      UPDATE shows SET
        show_name = @show_name,
        location = @location,
        quality = @quality,
        default_ep_status = @default_ep_status,
        lang = @lang,
        skip_downloaded = @skip_downloaded,
        subtitles = @subtitles,
        subtitles_sr_metadata = @subtitles_sr_metadata,
        paused = @paused,
        air_by_date = @air_by_date,
        sports = @sports,
        dvd_order = @dvd_order,
        anime = @anime,
        scene = @scene,
        season_folders = @season_folders,
        rls_ignore_words = @rls_ignore_words,
        rls_require_words = @rls_require_words,
        search_delay = @search_delay,
        updated_at = datetime('now')
      WHERE indexer_id = @indexer_id
    `).run(toParams(show));

    if (result.changes === 0) {
      throw new Error(`Show ${show.indexerId} was not updated`);
    }
  },

  remove: (indexerId: number): boolean => {
    sceneExceptionsModel.removeAllForShow(indexerId);
    const result = db.prepare('DELETE FROM shows WHERE indexer_id = ?').run(indexerId);
    return result.changes > 0;
  },
};
