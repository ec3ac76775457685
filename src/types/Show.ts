import type { QualitySelection } from '../quality/qualities';

export type EpisodeStatus = 'WANTED' | 'SKIPPED' | 'IGNORED';

export const EPISODE_STATUSES: readonly EpisodeStatus[] = ['WANTED', 'SKIPPED', 'IGNORED'];

export function isEpisodeStatus(value: string): value is EpisodeStatus {
  return (EPISODE_STATUSES as readonly string[]).includes(value);
}

export type ShowState = 'ACTIVE' | 'PAUSED';

export interface ShowSettings {
  indexerId: number;
  name: string;
  location: string;
  /** Packed initial/upgrade tiers, see quality/qualities.ts */
  quality: number;
  defaultEpisodeStatus: EpisodeStatus;
  language: string;
  skipDownloaded: boolean;
  subtitlesEnabled: boolean;
  subtitlesUseShowMetadata: boolean;
  paused: boolean;
  airByDate: boolean;
  sports: boolean;
  dvdOrder: boolean;
  isAnime: boolean;
  sceneNumbering: boolean;
  seasonFolders: boolean;
  ignoreWords: string[];
  requireWords: string[];
  sceneExceptions: string[];
  searchDelayDays: number;
  addedAt?: string;
  updatedAt?: string;
}

/** Fields the edit form can change. Absent keys mean "leave as stored". */
export type ShowSettingsUpdate = Partial<
  Omit<ShowSettings, 'indexerId' | 'name' | 'addedAt' | 'updatedAt'>
>;

export type ShowSettingsField = keyof ShowSettingsUpdate;

/**
 * What a form submission asks for. Quality arrives as tier selections and is
 * packed by the service.
 */
export interface ShowUpdateRequest extends Omit<ShowSettingsUpdate, 'quality'> {
  quality?: QualitySelection;
}

export interface NewShowInput {
  indexerId: number;
  name: string;
  location: string;
  language?: string;
}

/** Snapshot of the app-wide switches that gate per-show fields. */
export interface GlobalPolicy {
  useSubtitles: boolean;
  forceSeasonFolders: boolean;
}

export interface ShowDefaults {
  quality: number;
  defaultEpisodeStatus: EpisodeStatus;
  language: string;
  seasonFolders: boolean;
  subtitlesEnabled: boolean;
}

export interface SettingsChangedEvent {
  showId: number;
  changedFields: ShowSettingsField[];
  previous: ShowSettings;
  current: ShowSettings;
}
