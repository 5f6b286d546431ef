export const ZONE_KEYS = ['clients', 'edge', 'core_services', 'external_services', 'data_stores'] as const;
export type ZoneKey = (typeof ZONE_KEYS)[number];

export const RELATIONSHIP_TYPES = ['sync', 'async', 'data', 'auth'] as const;
export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

export const ROLES = ['actor', 'gateway', 'service', 'external', 'data_store'] as const;
export type Role = (typeof ROLES)[number];

export const NODE_TYPES = ['actor', 'container', 'component', 'data_store', 'external', 'system'] as const;
export type NodeType = (typeof NODE_TYPES)[number];

export const DEFAULT_PALETTE = ['#FDE68A', '#FBCFE8', '#E0E7FF', '#DB2777', '#0F172A'];
export const FONT_FAMILY = 'Inter, Arial, sans-serif';

export const ROLE_BY_ZONE: Record<ZoneKey, Role> = {
  clients: 'actor',
  edge: 'gateway',
  core_services: 'service',
  external_services: 'external',
  data_stores: 'data_store'
};

export const TYPE_BY_ROLE: Record<Role, NodeType> = {
  actor: 'actor',
  gateway: 'container',
  service: 'container',
  external: 'external',
  data_store: 'data_store'
};

export const SHAPE_BY_TYPE: Record<NodeType, string> = {
  actor: 'circular',
  container: 'rounded',
  component: 'rectangle',
  data_store: 'cylinder',
  external: 'cloud',
  system: 'rectangle'
};

export const SIZE_BY_TYPE: Record<NodeType, 'small' | 'medium' | 'large'> = {
  actor: 'small',
  container: 'medium',
  component: 'medium',
  data_store: 'medium',
  external: 'medium',
  system: 'large'
};

export const STEREOTYPE_BY_ROLE: Record<Role, string> = {
  actor: 'person',
  gateway: 'ingress',
  service: 'api',
  external: 'integration',
  data_store: 'database'
};

export const PLANTUML_SHAPE_BY_TYPE: Record<NodeType, string> = {
  actor: 'actor',
  container: 'component',
  component: 'component',
  data_store: 'database',
  external: 'cloud',
  system: 'component'
};

export const MERMAID_TYPE_BY_TYPE: Record<NodeType, string> = {
  actor: 'actor',
  container: 'class',
  component: 'class',
  data_store: 'entity',
  external: 'subgraph',
  system: 'class'
};

export interface EdgePreset {
  style: 'solid' | 'dashed';
  arrowhead: 'normal' | 'open';
  curvature: number;
  /** Index into the palette; negative counts from the end. */
  paletteIndex: number;
}

export const EDGE_PRESETS: Record<RelationshipType, EdgePreset> = {
  sync: { style: 'solid', arrowhead: 'normal', curvature: 0, paletteIndex: -1 },
  async: { style: 'dashed', arrowhead: 'open', curvature: 0, paletteIndex: 1 },
  data: { style: 'dashed', arrowhead: 'open', curvature: 0.1, paletteIndex: 3 },
  auth: { style: 'solid', arrowhead: 'normal', curvature: 0, paletteIndex: 2 }
};

export const LAYOUT_MAP: Record<string, string> = {
  'left-to-right': 'left-right',
  left_right: 'left-right',
  'left-right': 'left-right',
  'right-to-left': 'right-left',
  right_left: 'right-left',
  'top-down': 'top-down',
  top_down: 'top-down',
  'bottom-up': 'bottom-up',
  bottom_up: 'bottom-up',
  grid: 'grid'
};

// Keyword → role fallback for nodes without a zone. First hit wins.
const ROLE_KEYWORDS: Array<[Role, string[]]> = [
  ['actor', ['user', 'client', 'portal', 'browser', 'mobile']],
  ['gateway', ['gateway', 'edge', 'ingress']],
  ['data_store', ['db', 'database', 'store', 'storage', 'cache']],
  ['external', ['email', 'sms', 'auth', 'payment', 'third', 'external']]
];

export function roleFromLabel(label: string): Role {
  const lowered = label.toLowerCase();
  for (const [role, words] of ROLE_KEYWORDS) {
    if (words.some((w) => lowered.includes(w))) return role;
  }
  return 'service';
}

export function paletteAt(palette: readonly string[], index: number): string {
  const n = palette.length;
  return palette[((index % n) + n) % n] ?? DEFAULT_PALETTE[0] ?? '#000000';
}
