/** Lower-case slug of a label, unique within `existing` via `_2`, `_3`, ... suffixes. Registers the result. */
export function uniqueSlug(label: string, existing: Set<string>, fallback: string): string {
  const base = label.toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_+|_+$/g, '') || fallback;
  return claim(base, existing, '_');
}

/** Registers `base` (or `base__N`) as an edge id. Node slugs never contain `__`, so the parts stay splittable. */
export function uniqueEdgeId(base: string, existing: Set<string>): string {
  return claim(base, existing, '__');
}

function claim(base: string, existing: Set<string>, sep: string): string {
  let candidate = base;
  for (let counter = 2; existing.has(candidate); counter += 1) {
    candidate = `${base}${sep}${counter}`;
  }
  existing.add(candidate);
  return candidate;
}

export function labelKey(label: string): string {
  return label.trim().toLowerCase().replace(/\s+/g, ' ');
}

/** PascalCase identifier for Mermaid; always starts with a letter. */
export function mermaidIdentifier(label: string): string {
  const cleaned = label
    .split(/[^a-zA-Z0-9]/)
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join('');
  if (!cleaned) return 'Node';
  return /^[A-Za-z]/.test(cleaned) ? cleaned : `N${cleaned}`;
}
