import { describe, it, expect, beforeEach } from 'vitest';
import db from '../../../src/db';
import { SETTING_KEYS, settingsModel } from '../../../src/models/settings';
import { QUALITY_PRESETS } from '../../../src/quality/qualities';

describe('settingsModel', () => {
  beforeEach(() => {
    db.exec('DELETE FROM app_settings;');
  });

  it('treats missing global flags as off', () => {
    expect(settingsModel.getGlobalPolicy()).toEqual({ useSubtitles: false, forceSeasonFolders: false });
  });

  it('reads stored global flags', () => {
    settingsModel.setFlag(SETTING_KEYS.useSubtitles, true);
    settingsModel.set(SETTING_KEYS.forceSeasonFolders, 'true');

    expect(settingsModel.getGlobalPolicy()).toEqual({ useSubtitles: true, forceSeasonFolders: true });
  });

  it('falls back to built-in show defaults', () => {
    expect(settingsModel.getShowDefaults()).toEqual({
      quality: QUALITY_PRESETS.SD,
      defaultEpisodeStatus: 'SKIPPED',
      language: 'en',
      seasonFolders: true,
      subtitlesEnabled: false,
    });
  });

  it('ignores stored defaults that are not valid', () => {
    settingsModel.set(SETTING_KEYS.defaultQuality, 'lots');
    settingsModel.set(SETTING_KEYS.defaultEpStatus, 'MAYBE');

    const defaults = settingsModel.getShowDefaults();
    expect(defaults.quality).toBe(QUALITY_PRESETS.SD);
    expect(defaults.defaultEpisodeStatus).toBe('SKIPPED');
  });

  it('reads stored show defaults', () => {
    settingsModel.set(SETTING_KEYS.defaultQuality, String(QUALITY_PRESETS.HD1080p));
    settingsModel.set(SETTING_KEYS.defaultEpStatus, 'WANTED');
    settingsModel.set(SETTING_KEYS.defaultLanguage, 'de');
    settingsModel.setFlag(SETTING_KEYS.defaultSeasonFolders, false);

    expect(settingsModel.getShowDefaults()).toEqual({
      quality: QUALITY_PRESETS.HD1080p,
      defaultEpisodeStatus: 'WANTED',
      language: 'de',
      seasonFolders: false,
      subtitlesEnabled: false,
    });
  });

  it('replaces a stored value', () => {
    settingsModel.set(SETTING_KEYS.defaultLanguage, 'de');
    settingsModel.set(SETTING_KEYS.defaultLanguage, 'fr');

    expect(settingsModel.get(SETTING_KEYS.defaultLanguage)).toBe('fr');
    expect(settingsModel.getAll()).toEqual([{ key: 'default_language', value: 'fr' }]);
  });
});
