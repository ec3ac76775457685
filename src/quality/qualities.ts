/**
 * Quality tiers and the packed quality value stored per show.
 *
 * A packed value holds two tier sets in one unsigned 32-bit integer:
 * the low 16 bits are the tiers acceptable for an initial snatch, the
 * high 16 bits the tiers an existing download may be upgraded to.
 */

export const Quality = {
  NONE: 0,
  SDTV: 1,
  SDDVD: 1 << 1,
  HDTV: 1 << 2,
  RAWHDTV: 1 << 3,
  FULLHDTV: 1 << 4,
  HDWEBDL: 1 << 5,
  FULLHDWEBDL: 1 << 6,
  HDBLURAY: 1 << 7,
  FULLHDBLURAY: 1 << 8,
  UHD_4K_TV: 1 << 9,
  UHD_4K_WEBDL: 1 << 10,
  UHD_4K_BLURAY: 1 << 11,
  UHD_8K_TV: 1 << 12,
  UHD_8K_WEBDL: 1 << 13,
  UHD_8K_BLURAY: 1 << 14,
  UNKNOWN: 1 << 15,
} as const;

export type QualityTier = Exclude<keyof typeof Quality, 'NONE'>;

// Display order, lowest tier first. UNKNOWN stays last.
export const QUALITY_TIERS: readonly QualityTier[] = [
  'SDTV',
  'SDDVD',
  'HDTV',
  'RAWHDTV',
  'FULLHDTV',
  'HDWEBDL',
  'FULLHDWEBDL',
  'HDBLURAY',
  'FULLHDBLURAY',
  'UHD_4K_TV',
  'UHD_4K_WEBDL',
  'UHD_4K_BLURAY',
  'UHD_8K_TV',
  'UHD_8K_WEBDL',
  'UHD_8K_BLURAY',
  'UNKNOWN',
];

export const QUALITY_NAMES: Record<QualityTier, string> = {
  SDTV: 'SDTV',
  SDDVD: 'SD DVD',
  HDTV: '720p HDTV',
  RAWHDTV: 'RawHD',
  FULLHDTV: '1080p HDTV',
  HDWEBDL: '720p WEB-DL',
  FULLHDWEBDL: '1080p WEB-DL',
  HDBLURAY: '720p BluRay',
  FULLHDBLURAY: '1080p BluRay',
  UHD_4K_TV: '4K UHD TV',
  UHD_4K_WEBDL: '4K UHD WEB-DL',
  UHD_4K_BLURAY: '4K UHD BluRay',
  UHD_8K_TV: '8K UHD TV',
  UHD_8K_WEBDL: '8K UHD WEB-DL',
  UHD_8K_BLURAY: '8K UHD BluRay',
  UNKNOWN: 'Unknown',
};

const TIER_MASK = 0xffff;
const UPGRADE_SHIFT = 16;

export interface QualitySelection {
  initial: QualityTier[];
  upgrade: QualityTier[];
}

export function isQualityTier(value: string): value is QualityTier {
  return (QUALITY_TIERS as readonly string[]).includes(value);
}

export function tiersToMask(tiers: Iterable<QualityTier>): number {
  let mask = 0;
  for (const tier of tiers) {
    mask |= Quality[tier];
  }
  return mask;
}

export function maskToTiers(mask: number): QualityTier[] {
  return QUALITY_TIERS.filter((tier) => (mask & Quality[tier]) !== 0);
}

export function combineQualities(initial: Iterable<QualityTier>, upgrade: Iterable<QualityTier>): number {
  // >>> 0 keeps the value unsigned once UNKNOWN lands on bit 31
  return (tiersToMask(initial) | (tiersToMask(upgrade) << UPGRADE_SHIFT)) >>> 0;
}

export function splitQuality(value: number): QualitySelection {
  return {
    initial: maskToTiers(value & TIER_MASK),
    upgrade: maskToTiers((value >>> UPGRADE_SHIFT) & TIER_MASK),
  };
}

export function isValidPackedQuality(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xffffffff;
}

const SD: QualityTier[] = ['SDTV', 'SDDVD'];
const HD720p: QualityTier[] = ['HDTV', 'HDWEBDL', 'HDBLURAY'];
const HD1080p: QualityTier[] = ['FULLHDTV', 'FULLHDWEBDL', 'FULLHDBLURAY'];
const UHD_4K: QualityTier[] = ['UHD_4K_TV', 'UHD_4K_WEBDL', 'UHD_4K_BLURAY'];
const UHD_8K: QualityTier[] = ['UHD_8K_TV', 'UHD_8K_WEBDL', 'UHD_8K_BLURAY'];

export const QUALITY_PRESETS = {
  SD: combineQualities(SD, []),
  HD: combineQualities([...HD720p, ...HD1080p], []),
  HD720p: combineQualities(HD720p, []),
  HD1080p: combineQualities(HD1080p, []),
  UHD_4K: combineQualities(UHD_4K, []),
  UHD_8K: combineQualities(UHD_8K, []),
  ANY: combineQualities([...SD, ...HD720p, ...HD1080p, ...UHD_4K, ...UHD_8K, 'UNKNOWN'], []),
} as const;

export type QualityPreset = keyof typeof QUALITY_PRESETS;

export function isQualityPreset(value: string): value is QualityPreset {
  return Object.prototype.hasOwnProperty.call(QUALITY_PRESETS, value);
}

/** Name of the preset matching a packed value exactly, or `null` for a custom selection. */
export function presetForQuality(value: number): QualityPreset | null {
  for (const [name, preset] of Object.entries(QUALITY_PRESETS)) {
    if (preset === value && isQualityPreset(name)) {
      return name;
    }
  }
  return null;
}

export function describeQuality(value: number): string {
  const preset = presetForQuality(value);
  if (preset) return preset;

  const { initial, upgrade } = splitQuality(value);
  if (initial.length === 0 && upgrade.length === 0) return 'Never download';

  const allowed = initial.map((tier) => QUALITY_NAMES[tier]).join(', ') || 'none';
  if (upgrade.length === 0) return allowed;
  return `${allowed} (upgrade to ${upgrade.map((tier) => QUALITY_NAMES[tier]).join(', ')})`;
}
