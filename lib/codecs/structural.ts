import type { EnrichedIR } from '@/lib/enrich/schema';
import type { IRVersion } from '@/lib/ir/schema';

export interface StructuralIRNode {
  id: string;
  kind: string;
  label?: string;
  group?: string;
}

export interface StructuralIREdge {
  from: string;
  to: string;
  type: string;
  label?: string;
  /** Message order for sequence diagrams. */
  order?: number;
}

export interface StructuralIRGroup {
  id: string;
  label?: string;
  members: string[];
}

/** Renderer-neutral graph the codecs translate from. */
export interface StructuralIR {
  diagram_kind: string;
  layout: string;
  title?: string;
  nodes: StructuralIRNode[];
  edges: StructuralIREdge[];
  groups: StructuralIRGroup[];
}

function cmp(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareEdges(a: StructuralIREdge, b: StructuralIREdge): number {
  return cmp(a.from, b.from) || cmp(a.to, b.to) || cmp(a.type, b.type) || cmp(a.label ?? '', b.label ?? '');
}

export function isLeftRight(layout: string): boolean {
  return layout === 'left-right' || layout === 'left-to-right';
}

export function isSequence(ir: StructuralIR): boolean {
  return ir.diagram_kind.toLowerCase() === 'sequence';
}

/**
 * Sorted copy: nodes and groups by id, members by id, edges by (from, to, type, label).
 * Sequence diagrams order edges by `order` first so message order survives.
 */
export function normalizeStructural(ir: StructuralIR): StructuralIR {
  const edges = [...ir.edges].sort((a, b) =>
    isSequence(ir) ? (a.order ?? 0) - (b.order ?? 0) || compareEdges(a, b) : compareEdges(a, b)
  );
  return {
    ...ir,
    nodes: [...ir.nodes].sort((a, b) => cmp(a.id, b.id)),
    edges,
    groups: [...ir.groups].sort((a, b) => cmp(a.id, b.id)).map((g) => ({ ...g, members: [...g.members].sort(cmp) }))
  };
}

/** Zones become groups; hidden blocks stay in so the rendered structure matches the IR. */
export function structuralFromVersion(version: IRVersion, options: { layout?: string; title?: string } = {}): StructuralIR {
  const { diagram } = version.ir;
  const groups = new Map<string, string[]>();
  for (const block of diagram.blocks) {
    if (!block.zone) continue;
    groups.set(block.zone, [...(groups.get(block.zone) ?? []), block.id]);
  }
  return {
    diagram_kind: diagram.type,
    layout: options.layout ?? 'top-down',
    ...(options.title ? { title: options.title } : {}),
    nodes: diagram.blocks.map((b) => ({ id: b.id, kind: b.type, label: b.text, ...(b.zone ? { group: b.zone } : {}) })),
    edges: diagram.edges.map((e) => ({ from: e.from, to: e.to, type: e.relation_type, ...(e.label ? { label: e.label } : {}) })),
    groups: [...groups.entries()].map(([id, members]) => ({ id, label: id, members }))
  };
}

export function structuralFromEnriched(ir: EnrichedIR, title?: string): StructuralIR {
  return {
    diagram_kind: ir.diagram_type,
    layout: ir.layout,
    ...(title ? { title } : {}),
    nodes: ir.nodes.map((n) => ({ id: n.node_id, kind: n.type, label: n.label, ...(n.zone ? { group: n.zone } : {}) })),
    edges: ir.edges.map((e) => ({ from: e.from_id, to: e.to_id, type: e.rel_type, label: e.label })),
    groups: ir.zone_order.map((zone) => ({
      id: zone,
      label: zone,
      members: ir.nodes.filter((n) => n.zone === zone).map((n) => n.node_id)
    }))
  };
}
