import { ENGINE_DEFAULTS } from '@/config/engine';
import { uniqueEdgeId } from '@/lib/enrich/ids';
import type { EnrichedEdge, EnrichedNode, InferenceRecord, InferenceRule } from '@/lib/enrich/schema';
import { FONT_FAMILY, paletteAt, type RelationshipType, type ZoneKey } from '@/lib/enrich/tables';

/**
 * Connectivity inference.
 *
 * Three deterministic rules run in order over label-sorted nodes:
 *   1. zone_cascade      one bridging edge per adjacent zone pair with no edge between them
 *   2. tech_dependency   keyword pairs such as kafka → consumer
 *   3. completion_guard  any node still at degree 0 is tied to an anchor
 *
 * An existing edge for the exact (from, to) pair always suppresses an inferred one.
 */

export const ZONE_CASCADE_PAIRS: ReadonlyArray<readonly [ZoneKey, ZoneKey]> = [
  ['clients', 'edge'],
  ['edge', 'core_services'],
  ['core_services', 'data_stores'],
  ['external_services', 'core_services']
];

interface TechDependency {
  from: string;
  to: string;
  relType: RelationshipType;
  reason: string;
}

// First match per node pair wins.
export const TECH_DEPENDENCIES: readonly TechDependency[] = [
  { from: 'kafka', to: 'consumer', relType: 'async', reason: 'kafka feeds consumer' },
  { from: 'kafka', to: 'processor', relType: 'async', reason: 'kafka feeds processor' },
  { from: 'kafka', to: 'worker', relType: 'async', reason: 'kafka feeds worker' },
  { from: 'streaming', to: 'consumer', relType: 'async', reason: 'streaming feeds consumer' },
  { from: 'streaming', to: 'processor', relType: 'async', reason: 'streaming feeds processor' },
  { from: 'producer', to: 'kafka', relType: 'async', reason: 'producer publishes to kafka' },
  { from: 'producer', to: 'streaming', relType: 'async', reason: 'producer publishes to streaming' },
  { from: 'prometheus', to: 'grafana', relType: 'data', reason: 'prometheus scrapes to grafana' },
  { from: 'metrics', to: 'grafana', relType: 'data', reason: 'metrics flow to grafana' },
  { from: 'airflow', to: 'spark', relType: 'async', reason: 'airflow orchestrates spark' },
  { from: 'scheduler', to: 'spark', relType: 'async', reason: 'scheduler triggers spark' },
  { from: 'scheduler', to: 'worker', relType: 'async', reason: 'scheduler dispatches to worker' },
  { from: 'ingress', to: 'service', relType: 'sync', reason: 'ingress routes to service' },
  { from: 'gateway', to: 'service', relType: 'sync', reason: 'gateway routes to service' },
  { from: 'service', to: 'postgres', relType: 'data', reason: 'service reads/writes postgres' },
  { from: 'service', to: 'mysql', relType: 'data', reason: 'service reads/writes mysql' },
  { from: 'service', to: 'mongo', relType: 'data', reason: 'service reads/writes mongo' },
  { from: 'service', to: 'redis', relType: 'data', reason: 'service uses redis cache' },
  { from: 'primary', to: 'replica', relType: 'data', reason: 'primary replicates to replica' },
  { from: 'primary', to: 'secondary', relType: 'data', reason: 'primary replicates to secondary' },
  { from: 'dc', to: 'dr', relType: 'data', reason: 'dc replicates to dr site' }
];

export const RULE_CONFIDENCE: Record<InferenceRule, 0.3 | 0.5> = {
  zone_cascade: 0.5,
  tech_dependency: 0.5,
  completion_guard: 0.3
};

// The guard edge is the faintest thing on the canvas.
export const RULE_OPACITY: Record<InferenceRule, number> = {
  zone_cascade: 0.6,
  tech_dependency: 0.6,
  completion_guard: 0.4
};

export interface ConnectivityContext {
  nodes: readonly EnrichedNode[];
  /** Explicit edges; never modified. */
  edges: readonly EnrichedEdge[];
  zoneOrder: readonly ZoneKey[];
  palette: readonly string[];
  /** Edge ids already taken; inferred ids are registered here. */
  edgeIds: Set<string>;
}

export interface ConnectivityResult {
  edges: EnrichedEdge[];
  inferences: InferenceRecord[];
}

const byLabel = (a: EnrichedNode, b: EnrichedNode) => {
  const la = a.label.toLowerCase();
  const lb = b.label.toLowerCase();
  return la < lb ? -1 : la > lb ? 1 : 0;
};

const pairKey = (from: string, to: string) => `${from}\u0000${to}`;

export function inferConnections(ctx: ConnectivityContext): ConnectivityResult {
  const edges: EnrichedEdge[] = [];
  const inferences: InferenceRecord[] = [];
  if (!ctx.nodes.length) return { edges, inferences };

  const degree = new Map<string, number>(ctx.nodes.map((n) => [n.node_id, 0]));
  const bump = (id: string) => degree.set(id, (degree.get(id) ?? 0) + 1);
  for (const edge of ctx.edges) {
    bump(edge.from_id);
    bump(edge.to_id);
  }
  const existingPairs = new Set(ctx.edges.map((e) => pairKey(e.from_id, e.to_id)));

  const zoneNodes = new Map<ZoneKey, EnrichedNode[]>();
  for (const zone of ctx.zoneOrder) {
    zoneNodes.set(zone, ctx.nodes.filter((n) => n.zone === zone).sort(byLabel));
  }

  const add = (from: EnrichedNode, to: EnrichedNode, relType: RelationshipType, rule: InferenceRule, reason: string) => {
    const key = pairKey(from.node_id, to.node_id);
    if (existingPairs.has(key)) return;
    const confidence = RULE_CONFIDENCE[rule];
    const color = paletteAt(ctx.palette, 1);
    const edgeId = uniqueEdgeId(`${from.node_id}__${to.node_id}__inferred`, ctx.edgeIds);
    edges.push({
      edge_id: edgeId,
      from_id: from.node_id,
      to_id: to.node_id,
      rel_type: relType,
      label: reason,
      style: 'dashed',
      color,
      width: 1,
      opacity: RULE_OPACITY[rule],
      arrowhead: 'open',
      text_style: { fontSize: 11, fontFamily: FONT_FAMILY, textColor: color },
      curvature: 0,
      confidence,
      reason,
      inferred: true
    });
    inferences.push({ edge_id: edgeId, from_id: from.node_id, to_id: to.node_id, rule, reason, confidence });
    existingPairs.add(key);
    bump(from.node_id);
    bump(to.node_id);
  };

  // Rule 1: zone cascade
  for (const [fromZone, toZone] of ZONE_CASCADE_PAIRS) {
    const fromNodes = zoneNodes.get(fromZone) ?? [];
    const toNodes = zoneNodes.get(toZone) ?? [];
    const first = fromNodes[0];
    const second = toNodes[0];
    if (!first || !second) continue;
    const fromIds = new Set(fromNodes.map((n) => n.node_id));
    const toIds = new Set(toNodes.map((n) => n.node_id));
    const bridged = [...ctx.edges, ...edges].some(
      (e) => (fromIds.has(e.from_id) && toIds.has(e.to_id)) || (toIds.has(e.from_id) && fromIds.has(e.to_id))
    );
    if (bridged) continue;
    add(first, second, 'async', 'zone_cascade', `zone layer cascade: ${fromZone} → ${toZone}`);
  }

  // Rule 2: tech dependencies
  const sorted = [...ctx.nodes].sort(byLabel);
  sorted.forEach((a, i) => {
    const la = a.label.toLowerCase();
    for (const b of sorted.slice(i + 1)) {
      const lb = b.label.toLowerCase();
      for (const dep of TECH_DEPENDENCIES) {
        if (la.includes(dep.from) && lb.includes(dep.to)) {
          add(a, b, dep.relType, 'tech_dependency', dep.reason);
          break;
        }
        if (lb.includes(dep.from) && la.includes(dep.to)) {
          add(b, a, dep.relType, 'tech_dependency', `${dep.reason} (reversed)`);
          break;
        }
      }
    }
  });

  // Rule 3: completion guard
  const connected = (n: EnrichedNode, self: EnrichedNode) => n.node_id !== self.node_id && (degree.get(n.node_id) ?? 0) > 0;
  for (const node of sorted) {
    if ((degree.get(node.node_id) ?? 0) > 0) continue;
    const sameZone = node.zone ? zoneNodes.get(node.zone) ?? [] : [];
    const anchor =
      sameZone.find((c) => connected(c, node)) ??
      sorted.find((c) => connected(c, node)) ??
      sorted.find((c) => c.node_id !== node.node_id);
    if (!anchor) continue;
    add(anchor, node, 'async', 'completion_guard', `completion guard: '${node.label}' had no edges`);
  }

  return { edges, inferences };
}

export interface ConnectivityStats {
  nodes: number;
  edges: number;
  isolated: number;
  isolation_ratio: number;
  edge_floor: number;
  meets_isolation: boolean;
  meets_edge_floor: boolean;
}

/** Acceptance figures for an enriched graph: isolation ratio and `max(nodes - 1, floor)`. */
export function connectivityStats(
  ir: { nodes: ReadonlyArray<{ node_id: string }>; edges: ReadonlyArray<{ from_id: string; to_id: string }> },
  thresholds = ENGINE_DEFAULTS.connectivity
): ConnectivityStats {
  const touched = new Set<string>();
  for (const edge of ir.edges) {
    touched.add(edge.from_id);
    touched.add(edge.to_id);
  }
  const isolated = ir.nodes.filter((n) => !touched.has(n.node_id)).length;
  const total = ir.nodes.length;
  const ratio = total ? isolated / total : 0;
  const floor = Math.max(total - 1, thresholds.minEdgeFloor);
  return {
    nodes: total,
    edges: ir.edges.length,
    isolated,
    isolation_ratio: ratio,
    edge_floor: floor,
    meets_isolation: ratio <= thresholds.maxIsolatedRatio,
    meets_edge_floor: ir.edges.length >= floor
  };
}
