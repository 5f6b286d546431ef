import { NODE_TYPES, PLANTUML_SHAPE_BY_TYPE, type NodeType } from '@/lib/enrich/tables';

const KIND_ALIASES: Record<string, NodeType> = {
  person: 'actor',
  user: 'actor',
  database: 'data_store',
  datastore: 'data_store',
  db: 'data_store',
  service: 'container',
  api: 'container',
  gateway: 'container'
};

function isNodeType(kind: string): kind is NodeType {
  return NODE_TYPES.some((t) => t === kind);
}

/** Block type or node kind folded onto the enricher's node types; unknown kinds read as components. */
export function nodeTypeOf(kind: string): NodeType {
  const k = kind.trim().toLowerCase();
  if (isNodeType(k)) return k;
  return KIND_ALIASES[k] ?? 'component';
}

export function plantumlKeyword(kind: string): string {
  return PLANTUML_SHAPE_BY_TYPE[nodeTypeOf(kind)];
}

export function isAsyncEdge(type: string): boolean {
  return type.trim().toLowerCase() === 'async';
}
