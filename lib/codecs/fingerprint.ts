import { createHash } from 'node:crypto';

export type HashInput = string | number | boolean | null | HashInput[] | { [key: string]: HashInput | undefined };

/** Canonical JSON: object keys sorted, undefined members dropped. */
export function canonicalJson(input: HashInput): string {
  if (Array.isArray(input)) {
    return `[${input.map((item) => canonicalJson(item)).join(',')}]`;
  }
  if (input && typeof input === 'object') {
    const entries: string[] = [];
    for (const key of Object.keys(input).sort()) {
      const value = input[key];
      if (value === undefined) continue;
      entries.push(`${JSON.stringify(key)}:${canonicalJson(value)}`);
    }
    return `{${entries.join(',')}}`;
  }
  if (typeof input === 'string') return JSON.stringify(input);
  if (typeof input === 'number') return Number.isFinite(input) ? String(input) : '"NaN"';
  if (typeof input === 'boolean') return input ? 'true' : 'false';
  return 'null';
}

export const FINGERPRINT_LENGTH = 16;

export function fingerprint(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex').slice(0, FINGERPRINT_LENGTH);
}
