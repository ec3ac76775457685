import { GlobalPolicy, ShowSettings } from '../types/Show';

export type NumberingScheme = 'indexer' | 'scene';

export interface NamingPolicy {
  airByDate: boolean;
  sports: boolean;
  dvdOrder: boolean;
  isAnime: boolean;
  sceneNumbering: boolean;
  seasonFolders: boolean;
}

export function namingPolicyOf(show: ShowSettings): NamingPolicy {
  return {
    airByDate: show.airByDate,
    sports: show.sports,
    dvdOrder: show.dvdOrder,
    isAnime: show.isAnime,
    sceneNumbering: show.sceneNumbering,
    seasonFolders: show.seasonFolders,
  };
}

export function numberingScheme(policy: Pick<NamingPolicy, 'sceneNumbering'>): NumberingScheme {
  return policy.sceneNumbering ? 'scene' : 'indexer';
}

/**
 * Season folders can't be switched off while the app forces them.
 * An unset request is overridden, not rejected.
 */
export function resolveSeasonFolders(requested: boolean, global: Pick<GlobalPolicy, 'forceSeasonFolders'>): boolean {
  return requested || global.forceSeasonFolders;
}

/** Air-by-date and sports episodes are both named by air date. */
export function usesDateNaming(policy: Pick<NamingPolicy, 'airByDate' | 'sports'>): boolean {
  return policy.airByDate || policy.sports;
}

export interface FormHints {
  seasonFoldersLocked: boolean;
  subtitlesLocked: boolean;
  dateNamingConflict: boolean;
}

// Visibility hints for the edit form. None of these are validated on submit.
export function formHints(policy: NamingPolicy, global: GlobalPolicy): FormHints {
  return {
    seasonFoldersLocked: global.forceSeasonFolders,
    subtitlesLocked: !global.useSubtitles,
    dateNamingConflict: policy.airByDate && policy.sports,
  };
}
