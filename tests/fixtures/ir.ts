import type { Block, IRDocument, WireEdge } from '@/lib/ir/schema';

export function block(id: string, text: string, x = 0, zone?: string): Block {
  return {
    id,
    type: 'component',
    text,
    bbox: { x, y: 0, w: 140, h: 48 },
    style: {},
    annotations: {},
    version: 1,
    ...(zone ? { zone } : {})
  };
}

export function wire(from: string, to: string, relation = 'sync'): WireEdge {
  return {
    edge_id: `${from}__${to}`,
    from,
    to,
    relation_type: relation,
    direction: 'unidirectional',
    category: relation === 'async' ? 'data_flow' : 'control',
    mode: relation === 'async' ? 'async' : 'sync',
    label: '',
    confidence: 1
  };
}

/** web -> api -> db, with api and db in the core zone. */
export function threeTier(id = 'shop'): IRDocument {
  return {
    diagram: {
      id,
      type: 'architecture',
      blocks: [block('web', 'Web App', 0, 'clients'), block('api', 'Orders API', 200, 'core'), block('db', 'Orders DB', 400, 'core')],
      edges: [wire('web', 'api'), wire('api', 'db', 'async')]
    }
  };
}
