import { z } from 'zod';
import { CONTRASTS, DENSITIES, MOODS } from '@/lib/enrich/schema';
import { DEFAULT_PALETTE } from '@/lib/enrich/tables';

export type Mood = (typeof MOODS)[number];
export type Density = (typeof DENSITIES)[number];
export type Contrast = (typeof CONTRASTS)[number];

export interface ResolvedIntent {
  palette: string[];
  mood: Mood;
  /** Undefined when the caller gave none; the enricher then derives it from node count. */
  density?: Density;
  contrast: Contrast;
}

const MAX_COLORS = 8;
const MIN_COLORS = 2;

const Loose = z.record(z.unknown()).catch({});

const IntentSchema = z
  .object({
    userPalette: z.unknown().optional(),
    metadata: Loose.optional(),
    globalIntent: Loose.optional(),
    mood: z.unknown().optional(),
    density: z.unknown().optional(),
    contrast: z.unknown().optional()
  })
  .passthrough();

export function normalizeColor(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const token = value.trim();
  if (!token) return undefined;
  if (/^#[0-9a-f]{6}$/i.test(token)) return token.toUpperCase();
  const short = token.match(/^#([0-9a-f]{3})$/i);
  if (short?.[1]) {
    return `#${short[1].split('').map((ch) => ch + ch).join('')}`.toUpperCase();
  }
  const rgb = token.match(/^rgb\(\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\s*\)$/i);
  if (rgb) {
    const hex = rgb
      .slice(1, 4)
      .map((part) => Math.max(0, Math.min(255, Number(part))).toString(16).padStart(2, '0'))
      .join('');
    return `#${hex}`.toUpperCase();
  }
  return undefined;
}

function asList(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  if (value === undefined || value === null) return [];
  return [value];
}

export function derivePalette(userPalette: unknown): string[] {
  const palette: string[] = [];
  for (const raw of asList(userPalette)) {
    const color = normalizeColor(raw);
    if (color) palette.push(color);
  }
  if (palette.length < MIN_COLORS) {
    palette.push(...DEFAULT_PALETTE.filter((c) => !palette.includes(c)));
  }
  return palette.slice(0, MAX_COLORS);
}

function pickEnum<T extends string>(allowed: readonly T[], ...candidates: unknown[]): T | undefined {
  for (const candidate of candidates) {
    if (typeof candidate !== 'string') continue;
    const normalized = candidate.trim().toLowerCase();
    const hit = allowed.find((a) => a === normalized);
    if (hit) return hit;
  }
  return undefined;
}

/**
 * Fold an optional, untrusted aesthetic intent into closed enums and a 2–8 colour palette.
 * Anything unrecognized falls back to defaults; this never throws.
 */
export function resolveIntent(raw: unknown): ResolvedIntent {
  const parsed = IntentSchema.safeParse(raw ?? {});
  const intent = parsed.success ? parsed.data : IntentSchema.parse({});
  const metadata = intent.metadata ?? {};
  const global = intent.globalIntent ?? {};
  const density = pickEnum(DENSITIES, global.density, intent.density);
  return {
    palette: derivePalette(metadata.userPalette ?? intent.userPalette),
    mood: pickEnum(MOODS, global.mood, intent.mood) ?? 'minimal',
    ...(density ? { density } : {}),
    contrast: pickEnum(CONTRASTS, global.contrast, intent.contrast) ?? 'medium'
  };
}
