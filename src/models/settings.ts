import db from '../db';
import { QUALITY_PRESETS, isValidPackedQuality } from '../quality/qualities';
import { GlobalPolicy, ShowDefaults, isEpisodeStatus } from '../types/Show';

export const SETTING_KEYS = {
  useSubtitles: 'use_subtitles',
  forceSeasonFolders: 'force_season_folders',
  defaultQuality: 'default_quality',
  defaultEpStatus: 'default_ep_status',
  defaultLanguage: 'default_language',
  defaultSeasonFolders: 'default_season_folders',
  defaultSubtitles: 'default_subtitles',
} as const;

function parseFlag(value: string | null, fallback: boolean): boolean {
  if (value === null) return fallback;
  return value === '1' || value.toLowerCase() === 'true';
}

export const settingsModel = {
  get: (key: string): string | null => {
    const row = db.prepare('SELECT value FROM app_settings WHERE key = ?').get(key) as { value: string } | undefined;
    return row?.value ?? null;
  },

  set: (key: string, value: string): void => {
    db.prepare('INSERT OR REPLACE INTO app_settings (key, value) VALUES (?, ?)').run(key, value);
  },

  setFlag: (key: string, value: boolean): void => {
    settingsModel.set(key, value ? '1' : '0');
  },

  getAll: (): Array<{ key: string; value: string }> => {
    const rows = db.prepare('SELECT key, value FROM app_settings').all() as Array<{ key: string; value: string }>;
    return rows;
  },

  getGlobalPolicy: (): GlobalPolicy => ({
    useSubtitles: parseFlag(settingsModel.get(SETTING_KEYS.useSubtitles), false),
    forceSeasonFolders: parseFlag(settingsModel.get(SETTING_KEYS.forceSeasonFolders), false),
  }),

  getShowDefaults: (): ShowDefaults => {
    const rawQuality = settingsModel.get(SETTING_KEYS.defaultQuality);
    const parsedQuality = rawQuality === null ? NaN : Number(rawQuality);
    const rawStatus = settingsModel.get(SETTING_KEYS.defaultEpStatus);

    return {
      quality: isValidPackedQuality(parsedQuality) ? parsedQuality : QUALITY_PRESETS.SD,
      defaultEpisodeStatus: rawStatus && isEpisodeStatus(rawStatus) ? rawStatus : 'SKIPPED',
      language: settingsModel.get(SETTING_KEYS.defaultLanguage) || 'en',
      seasonFolders: parseFlag(settingsModel.get(SETTING_KEYS.defaultSeasonFolders), true),
      subtitlesEnabled: parseFlag(settingsModel.get(SETTING_KEYS.defaultSubtitles), false),
    };
  },
};
