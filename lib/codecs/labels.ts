export interface LabelSanitizeOptions {
  banQuotes?: boolean;        // default true
  banHtml?: boolean;          // default true
  banBrackets?: boolean;      // default true
  /** Truncate after this many characters. */
  max?: number;
}

const UNICODE_REPLACEMENTS: Array<[RegExp, string]> = [
  [/[“”«»„‟]/g, '"'],
  [/[‘’‚‛]/g, "'"],
  [/[–—]/g, '-'],
  [/…/g, '...'],
  [/[•]/g, '-']
];

export function normalizeUnicode(text: string): string {
  return UNICODE_REPLACEMENTS.reduce((acc, [re, replacement]) => acc.replace(re, replacement), text);
}

/** Single-line label free of characters that break PlantUML or Mermaid quoting. */
export function sanitizeLabelText(raw: string, opt: LabelSanitizeOptions = {}): string {
  const o = { banQuotes: true, banHtml: true, banBrackets: true, ...opt };
  let s = normalizeUnicode(raw).replace(/\r\n?|\n/g, ' ');
  if (o.banHtml) s = s.replace(/<[^>]*>/g, ' ');
  if (o.banQuotes) s = s.replace(/["'`]/g, '');
  if (o.banBrackets) s = s.replace(/[\[\]\{\}\(\)<>|;]/g, '');
  s = s.replace(/\s+/g, ' ').trim();
  return o.max !== undefined ? s.slice(0, o.max).trim() : s;
}

export function labelOr(raw: string | undefined, fallback: string, opt: LabelSanitizeOptions = {}): string {
  return sanitizeLabelText(raw ?? '', opt) || fallback;
}
