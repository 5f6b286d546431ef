import { z } from 'zod';
import { SchemaError, ValidationError, issuesFromZod } from '@/lib/errors';
import type { EnrichedEdge, EnrichedIR, EnrichedNode } from '@/lib/enrich/schema';
import type { RelationshipType } from '@/lib/enrich/tables';
import {
  BBoxSchema,
  JsonValueSchema,
  StyleValueSchema,
  WireEdgeSchema,
  type BBox,
  type Block,
  type EdgeCategory,
  type EdgeMode,
  type IRVersion,
  type WireEdge
} from '@/lib/ir/schema';
import { makeVersion } from '@/lib/ir/versioning';
import { analyze } from '@/lib/svg/analyzer';
import { element, findFirst, fromDraft, parseSvgTree, serializeTree, textContent, attr, type DraftElement } from '@/lib/svg/tree';

export const IR_METADATA_ID = 'ir_metadata';

const NODE_W = 140;
const NODE_H = 48;
const ZONE_PAD = 20;

const EDGE_SEMANTICS: Record<RelationshipType, { category: EdgeCategory; mode: EdgeMode }> = {
  sync: { category: 'control', mode: 'sync' },
  async: { category: 'data_flow', mode: 'async' },
  data: { category: 'data_flow', mode: 'sync' },
  auth: { category: 'auth', mode: 'sync' }
};

function isColumnLayout(layout: string): boolean {
  return layout === 'left-right' || layout === 'right-left';
}

function placeNodes(ir: EnrichedIR): Map<string, BBox> {
  const slots = new Map<string, BBox>();
  const lanes: Array<string | null> = [...ir.zone_order, null];
  const columns = isColumnLayout(ir.layout);
  lanes.forEach((zone, lane) => {
    const members = ir.nodes.filter((n) => n.zone === zone);
    members.forEach((node, slot) => {
      slots.set(
        node.node_id,
        columns
          ? { x: 40 + lane * 200, y: 60 + slot * 80, w: NODE_W, h: NODE_H }
          : { x: 40 + slot * 180, y: 60 + lane * 120, w: NODE_W, h: NODE_H }
      );
    });
  });
  return slots;
}

function toBlock(node: EnrichedNode, bbox: BBox): Block {
  return {
    id: node.node_id,
    type: node.type,
    text: node.label,
    bbox,
    style: {
      fill: node.node_style.fillColor,
      stroke: node.node_style.borderColor,
      text_color: node.node_style.textColor,
      stroke_width: node.node_style.borderWidth,
      font_size: node.node_style.fontSize,
      font_family: node.node_style.fontFamily,
      shape: node.shape
    },
    annotations: {
      role: node.role,
      stereotype: node.stereotype,
      size_hint: node.size_hint,
      confidence: node.metadata.confidence,
      reason: node.metadata.reason
    },
    version: 1,
    ...(node.zone ? { zone: node.zone } : {})
  };
}

function toWireEdge(edge: EnrichedEdge): WireEdge {
  const semantics = EDGE_SEMANTICS[edge.rel_type];
  return {
    edge_id: edge.edge_id,
    from: edge.from_id,
    to: edge.to_id,
    relation_type: edge.rel_type,
    direction: 'unidirectional',
    category: semantics.category,
    mode: semantics.mode,
    label: edge.label,
    confidence: edge.confidence
  };
}

/** Lay an enriched IR out by zone and mint it as version 1 of `diagramId`. */
export function toIrVersion(ir: EnrichedIR, diagramId: string): IRVersion {
  const slots = placeNodes(ir);
  const blocks = ir.nodes.map((node) => toBlock(node, slots.get(node.node_id) ?? { x: 0, y: 0, w: NODE_W, h: NODE_H }));
  return makeVersion(
    diagramId,
    { diagram: { id: diagramId, type: ir.diagram_type, blocks, edges: ir.edges.map(toWireEdge) } },
    null
  );
}

const SvgNodeMetaSchema = z.object({
  node_id: z.string().min(1),
  label: z.string(),
  zone: z.string().nullable().optional(),
  type: z.string().min(1),
  bbox: BBoxSchema.optional(),
  style: z.record(StyleValueSchema).optional(),
  annotations: z.record(JsonValueSchema).optional(),
  hidden: z.boolean().optional()
});

export const SvgMetadataSchema = z.object({
  diagram_type: z.string().min(1),
  layout: z.string(),
  zone_order: z.array(z.string()),
  nodes: z.array(SvgNodeMetaSchema),
  edges: z.array(WireEdgeSchema)
});

export type SvgMetadata = z.infer<typeof SvgMetadataSchema>;

export interface RenderOptions {
  layout?: string;
}

function zoneOrderOf(blocks: readonly Block[]): string[] {
  const order: string[] = [];
  for (const block of blocks) {
    if (block.zone && !order.includes(block.zone)) order.push(block.zone);
  }
  return order;
}

function centre(b: BBox): [number, number] {
  return [b.x + b.w / 2, b.y + b.h / 2];
}

function fmt(n: number): string {
  return String(Math.round(n * 100) / 100);
}

function styleString(block: Block, key: string, fallback: string): string {
  const value = block.style[key];
  return value === undefined ? fallback : String(value);
}

function boundaryElement(zone: string, members: readonly Block[]): DraftElement {
  const minX = Math.min(...members.map((b) => b.bbox.x)) - ZONE_PAD;
  const minY = Math.min(...members.map((b) => b.bbox.y)) - ZONE_PAD;
  const maxX = Math.max(...members.map((b) => b.bbox.x + b.bbox.w)) + ZONE_PAD;
  const maxY = Math.max(...members.map((b) => b.bbox.y + b.bbox.h)) + ZONE_PAD;
  return element('g', { id: `zone__${zone}`, 'data-kind': 'boundary', 'data-zone': zone }, [
    element('rect', {
      x: fmt(minX),
      y: fmt(minY),
      width: fmt(maxX - minX),
      height: fmt(maxY - minY),
      fill: 'none',
      stroke: '#94A3B8',
      'stroke-dasharray': '4 4'
    }),
    element('text', { x: fmt(minX + 6), y: fmt(minY + 14), 'font-size': '11' }, [zone])
  ]);
}

function blockElement(block: Block): DraftElement {
  const attrs: Record<string, string> = { id: block.id, 'data-kind': 'node' };
  if (block.zone) attrs['data-zone'] = block.zone;
  const role = block.annotations.role;
  if (typeof role === 'string') attrs['data-role'] = role;
  if (block.hidden) {
    attrs['data-hidden'] = 'true';
    attrs.display = 'none';
  }
  const [cx, cy] = centre(block.bbox);
  return element('g', attrs, [
    element('rect', {
      x: fmt(block.bbox.x),
      y: fmt(block.bbox.y),
      width: fmt(block.bbox.w),
      height: fmt(block.bbox.h),
      rx: '8',
      fill: styleString(block, 'fill', '#FFFFFF'),
      stroke: styleString(block, 'stroke', '#0F172A')
    }),
    element(
      'text',
      { x: fmt(cx), y: fmt(cy + 4), 'text-anchor': 'middle', fill: styleString(block, 'text_color', '#0F172A') },
      [block.text]
    )
  ]);
}

function edgeElement(edge: WireEdge, byId: Map<string, Block>): DraftElement {
  const from = byId.get(edge.from);
  const to = byId.get(edge.to);
  const [x1, y1] = from ? centre(from.bbox) : [0, 0];
  const [x2, y2] = to ? centre(to.bbox) : [0, 0];
  const pathAttrs: Record<string, string> = {
    d: `M ${fmt(x1)} ${fmt(y1)} L ${fmt(x2)} ${fmt(y2)}`,
    fill: 'none',
    stroke: '#475569'
  };
  if (edge.mode === 'async') pathAttrs['stroke-dasharray'] = '6 4';
  const content: Array<DraftElement | string> = [element('path', pathAttrs)];
  if (edge.label) {
    content.push(element('text', { x: fmt((x1 + x2) / 2), y: fmt((y1 + y2) / 2 - 4), 'font-size': '10' }, [edge.label]));
  }
  return element('g', { id: edge.edge_id, 'data-kind': 'edge', 'data-role': edge.relation_type }, content);
}

export function metadataOf(version: IRVersion, layout: string): SvgMetadata {
  const { diagram } = version.ir;
  return {
    diagram_type: diagram.type,
    layout,
    zone_order: zoneOrderOf(diagram.blocks),
    nodes: diagram.blocks.map((b) => ({
      node_id: b.id,
      label: b.text,
      zone: b.zone ?? null,
      type: b.type,
      bbox: b.bbox,
      style: b.style,
      annotations: b.annotations,
      ...(b.hidden ? { hidden: true } : {})
    })),
    edges: diagram.edges
  };
}

/**
 * Neutral SVG for a version: zone boundaries, node groups and edge groups, all
 * addressable by id, plus the `ir_metadata` JSON used to come back to IR.
 */
export function renderVersionSvg(version: IRVersion, options: RenderOptions = {}): string {
  const { diagram } = version.ir;
  const layout = options.layout ?? 'top-down';
  const width = Math.max(320, ...diagram.blocks.map((b) => b.bbox.x + b.bbox.w + 40));
  const height = Math.max(240, ...diagram.blocks.map((b) => b.bbox.y + b.bbox.h + 40));
  const byId = new Map(diagram.blocks.map((b) => [b.id, b]));
  const metadata = JSON.stringify(metadataOf(version, layout));

  const zones = zoneOrderOf(diagram.blocks).map((zone) =>
    boundaryElement(zone, diagram.blocks.filter((b) => b.zone === zone))
  );
  const root = element(
    'svg',
    {
      xmlns: 'http://www.w3.org/2000/svg',
      width: fmt(width),
      height: fmt(height),
      viewBox: `0 0 ${fmt(width)} ${fmt(height)}`,
      'data-diagram-type': diagram.type
    },
    [
      element('metadata', { id: IR_METADATA_ID }, [metadata]),
      ...zones,
      ...diagram.blocks.map(blockElement),
      ...diagram.edges.map((edge) => edgeElement(edge, byId))
    ]
  );
  return serializeTree(fromDraft(root));
}

function readMetadata(svgText: string): SvgMetadata | undefined {
  const tree = parseSvgTree(svgText);
  const node = findFirst(tree, (n) => n.tag === 'metadata' && attr(tree, n.index, 'id') === IR_METADATA_ID);
  if (!node) return undefined;
  let payload: unknown;
  try {
    payload = JSON.parse(textContent(tree, node.index));
  } catch (err) {
    throw new SchemaError(
      [{ path: IR_METADATA_ID, message: err instanceof Error ? err.message : String(err) }],
      'Unreadable SVG metadata'
    );
  }
  const parsed = SvgMetadataSchema.safeParse(payload);
  if (!parsed.success) throw new SchemaError(issuesFromZod(parsed.error), 'Invalid SVG metadata');
  return parsed.data;
}

function blocksFromMetadata(meta: SvgMetadata): Block[] {
  return meta.nodes.map((n) => ({
    id: n.node_id,
    type: n.type,
    text: n.label,
    bbox: n.bbox ?? { x: 0, y: 0, w: NODE_W, h: NODE_H },
    style: n.style ?? {},
    annotations: n.annotations ?? {},
    version: 1,
    ...(n.hidden ? { hidden: true } : {}),
    ...(n.zone ? { zone: n.zone } : {})
  }));
}

/**
 * Rebuild an IRVersion (v1) from SVG. The `ir_metadata` payload is authoritative;
 * without it the structural graph is used, and an edge with an unresolved endpoint
 * is a {@link ValidationError} rather than being dropped.
 */
export function versionFromSvg(svgText: string, diagramId: string): IRVersion {
  const meta = readMetadata(svgText);
  if (meta) {
    return makeVersion(
      diagramId,
      { diagram: { id: diagramId, type: meta.diagram_type, blocks: blocksFromMetadata(meta), edges: meta.edges } },
      null
    );
  }

  const graph = analyze(svgText, diagramId);
  const unresolved = graph.edges.filter((e) => e.source_id === null || e.target_id === null);
  if (unresolved.length) {
    throw new ValidationError(
      `SVG has ${unresolved.length} edge(s) with unresolved endpoints`,
      unresolved.map((e) => ({ path: e.id, message: `source=${e.source_id ?? 'unknown'} target=${e.target_id ?? 'unknown'}` }))
    );
  }
  const blocks: Block[] = graph.nodes
    .filter((n) => n.element_type === 'node')
    .map((n) => ({
      id: n.id,
      type: 'component',
      text: n.label,
      bbox: { x: n.bounds.x, y: n.bounds.y, w: n.bounds.width, h: n.bounds.height },
      style: {},
      annotations: {},
      version: 1,
      ...(n.zone ? { zone: n.zone } : {})
    }));
  const edges: WireEdge[] = graph.edges.map((e) => {
    const match = [e.source_match?.confidence, e.target_match?.confidence].filter((c): c is number => c !== undefined);
    return {
      edge_id: e.id,
      from: e.source_id ?? '',
      to: e.target_id ?? '',
      relation_type: e.edge_type,
      direction: 'unidirectional',
      category: 'control',
      mode: 'sync',
      label: e.label,
      confidence: match.length ? Math.min(...match) : 1
    };
  });
  return makeVersion(diagramId, { diagram: { id: diagramId, type: graph.diagram_type, blocks, edges } }, null);
}
