import { z } from 'zod';
import { FieldErrors, FormValidationError } from '../errors';
import { parseWordList } from '../filters/wordLists';
import {
  QualitySelection,
  QualityTier,
  isQualityPreset,
  isQualityTier,
  splitQuality,
  QUALITY_PRESETS,
} from '../quality/qualities';
import { ShowUpdateRequest } from '../types/Show';

export type FormBody = Record<string, unknown>;

export interface EditShowSubmission {
  showId: number;
  update: ShowUpdateRequest;
}

type CheckboxField =
  | 'skipDownloaded'
  | 'subtitlesEnabled'
  | 'subtitlesUseShowMetadata'
  | 'paused'
  | 'airByDate'
  | 'sports'
  | 'dvdOrder'
  | 'isAnime'
  | 'seasonFolders'
  | 'sceneNumbering';

// Checkbox inputs: name in the form -> field on the show.
// flatten_folders keeps its old name but checked now means season folders ON.
export const CHECKBOX_FIELDS: ReadonlyArray<readonly [string, CheckboxField]> = [
  ['skip_downloaded', 'skipDownloaded'],
  ['subtitles', 'subtitlesEnabled'],
  ['subtitles_sr_metadata', 'subtitlesUseShowMetadata'],
  ['paused', 'paused'],
  ['air_by_date', 'airByDate'],
  ['sports', 'sports'],
  ['dvdorder', 'dvdOrder'],
  ['anime', 'isAnime'],
  ['flatten_folders', 'seasonFolders'],
  ['scene', 'sceneNumbering'],
];

const formValue = z.union([z.string(), z.array(z.string())]);

// Repeated single-value fields keep the last value, as a browser would send it
const single = formValue.optional().transform((value) => (Array.isArray(value) ? value[value.length - 1] : value));

const multi = formValue
  .optional()
  .transform((value) => (value === undefined ? undefined : Array.isArray(value) ? value : [value]));

const blankToUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const tierList = multi.refine(
  (values) => values === undefined || values.every((value) => isQualityTier(value)),
  'contains an unknown quality'
);

const editShowFormSchema = z.object({
  show: z.union([z.string(), z.number()]).pipe(z.coerce.number().int('must be a show id').positive('must be a show id')),
  location: single.pipe(z.string({ required_error: 'is required' }).trim().min(1, 'is required')),
  defaultEpStatus: single.pipe(z.enum(['WANTED', 'SKIPPED', 'IGNORED']).optional()),
  indexerLang: single.pipe(z.string().trim().min(1, 'cannot be empty').optional()),
  search_delay: z.preprocess(
    blankToUndefined,
    single.pipe(
      z
        .string()
        .trim()
        .regex(/^\d+$/, 'must be a non-negative whole number')
        .transform((value) => Number(value))
        .refine((value) => Number.isSafeInteger(value), 'is too large')
        .optional()
    )
  ),
  rls_ignore_words: single,
  rls_require_words: single,
  exceptions_list: multi,
  // Set by the edit page so an empty multi-select reads as "remove all"
  exceptions_shown: single,
  quality_preset: single.refine(
    (value) => value === undefined || value === 'custom' || isQualityPreset(value),
    'is not a known preset'
  ),
  // Preset the page was rendered with
  quality_preset_shown: single,
  anyQualities: tierList,
  bestQualities: tierList,
});

type ParsedForm = z.infer<typeof editShowFormSchema>;

/** Checkbox semantics: an unchecked box is absent from the body, never "false". */
export function present(body: FormBody, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(body, name);
}

function toTiers(values: string[] | undefined): QualityTier[] {
  return (values ?? []).filter(isQualityTier);
}

function qualityFromForm(parsed: ParsedForm): QualitySelection | undefined {
  const preset = parsed.quality_preset;
  const shown = parsed.quality_preset_shown;
  const tiersSent = parsed.anyQualities !== undefined || parsed.bestQualities !== undefined;

  // A preset only replaces the checkboxes when it was picked on this submit,
  // or when it arrives without any tiers
  if (preset !== undefined && preset !== 'custom' && isQualityPreset(preset)) {
    const picked = shown !== undefined ? preset !== shown : !tiersSent;
    if (picked) {
      return splitQuality(QUALITY_PRESETS[preset]);
    }
  }

  // No quality inputs at all: leave quality alone
  if (preset === undefined && shown === undefined && !tiersSent) {
    return undefined;
  }

  return {
    initial: toTiers(parsed.anyQualities),
    upgrade: toTiers(parsed.bestQualities),
  };
}

function fieldErrorsOf(error: z.ZodError): FieldErrors {
  const fields: FieldErrors = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? String(issue.path[0]) : 'form';
    if (!fields[field]) {
      fields[field] = issue.message;
    }
  }
  return fields;
}

export function parseEditShowForm(body: unknown): EditShowSubmission {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new FormValidationError({ form: 'must be a form body' });
  }
  const form: FormBody = { ...body };

  const result = editShowFormSchema.safeParse(form);
  if (!result.success) {
    throw new FormValidationError(fieldErrorsOf(result.error));
  }
  const parsed = result.data;

  const update: ShowUpdateRequest = {
    location: parsed.location,
  };

  for (const [name, field] of CHECKBOX_FIELDS) {
    update[field] = present(form, name);
  }

  if (parsed.defaultEpStatus !== undefined) update.defaultEpisodeStatus = parsed.defaultEpStatus;
  if (parsed.indexerLang !== undefined) update.language = parsed.indexerLang;
  if (parsed.search_delay !== undefined) update.searchDelayDays = parsed.search_delay;
  if (parsed.rls_ignore_words !== undefined) update.ignoreWords = parseWordList(parsed.rls_ignore_words);
  if (parsed.rls_require_words !== undefined) update.requireWords = parseWordList(parsed.rls_require_words);
  if (parsed.exceptions_list !== undefined || parsed.exceptions_shown !== undefined) {
    update.sceneExceptions = (parsed.exceptions_list ?? [])
      .map((name) => name.trim())
      .filter((name) => name.length > 0);
  }

  const quality = qualityFromForm(parsed);
  if (quality) update.quality = quality;

  return { showId: parsed.show, update };
}
