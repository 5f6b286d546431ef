const RESERVED = new Set([
  'end', 'subgraph', 'graph', 'classdef', 'style', 'linkstyle', 'click',
  'acctitle', 'accdescr', 'flowchart', 'sequencediagram', 'participant',
  'startuml', 'enduml', 'component', 'database', 'actor', 'package', 'node',
  'cloud', 'rectangle', 'title', 'as', 'skinparam', 'direction'
]);

/** Target-safe token: `[A-Za-z0-9_]`, leading letter, never a keyword of a supported renderer language. */
export function sanitizeId(raw: string): string {
  const s = raw.trim().replace(/[^A-Za-z0-9_]/g, '_') || 'node';
  const t = /^[A-Za-z]/.test(s) ? s : `n_${s.replace(/^_+/, '')}`;
  return RESERVED.has(t.toLowerCase()) ? `n_${t}` : t;
}

/**
 * Hands out sanitized identifiers for one rendered document. Two raw ids that
 * sanitize to the same token get numeric suffixes in allocation order, so the
 * caller must allocate in a stable order.
 */
export class IdAllocator {
  private readonly assigned = new Map<string, string>();
  private readonly taken = new Set<string>();

  constructor(private readonly scope = 'codec') {}

  get(raw: string): string {
    const existing = this.assigned.get(raw);
    if (existing !== undefined) return existing;
    const base = sanitizeId(raw);
    let candidate = base;
    for (let n = 2; this.taken.has(candidate); n += 1) candidate = `${base}_${n}`;
    if (candidate !== base) {
      console.warn('[CODEC_ID_COLLISION]', { scope: this.scope, raw, base, assigned: candidate });
    }
    this.assigned.set(raw, candidate);
    this.taken.add(candidate);
    return candidate;
  }

  entries(): Array<[string, string]> {
    return [...this.assigned.entries()];
  }
}
