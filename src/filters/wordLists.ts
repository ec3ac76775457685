/**
 * Ignore/require word lists and the release-name checks built on them
 */

/**
 * Parse comma-separated free text into trimmed, non-empty words.
 * Empty input gives an empty list, which means "no filter".
 */
export function parseWordList(text: string | null | undefined): string[] {
  if (!text) return [];
  return text
    .split(',')
    .map((word) => word.trim())
    .filter((word) => word.length > 0);
}

export function formatWordList(words: readonly string[]): string {
  return words.join(',');
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive whole-word match. Dots, dashes, underscores and spaces
 * all separate words in release names.
 */
export function containsWord(releaseName: string, word: string): boolean {
  const pattern = new RegExp(`(^|[\\W_])${escapeRegex(word)}($|[\\W_])`, 'i');
  return pattern.test(releaseName);
}

export interface WordFilter {
  ignoreWords: readonly string[];
  requireWords: readonly string[];
}

export type ReleaseRejection =
  | { reason: 'ignored-word'; word: string }
  | { reason: 'missing-required-word' };

/** Why a release would be excluded, or `null` when it passes both lists. */
export function releaseRejection(releaseName: string, filter: WordFilter): ReleaseRejection | null {
  const ignored = filter.ignoreWords.find((word) => containsWord(releaseName, word));
  if (ignored) {
    return { reason: 'ignored-word', word: ignored };
  }

  if (filter.requireWords.length > 0 && !filter.requireWords.some((word) => containsWord(releaseName, word))) {
    return { reason: 'missing-required-word' };
  }

  return null;
}

export function isReleaseAcceptable(releaseName: string, filter: WordFilter): boolean {
  return releaseRejection(releaseName, filter) === null;
}

/**
 * Names a release must match to belong to a show. Scene exceptions replace
 * the canonical name rather than adding to it.
 */
export function matchNamesForShow(show: { name: string; sceneExceptions: readonly string[] }): string[] {
  return show.sceneExceptions.length > 0 ? [...show.sceneExceptions] : [show.name];
}
