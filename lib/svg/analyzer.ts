import type {
  Bounds,
  EndpointMatch,
  Point,
  StructuralEdge,
  StructuralElement,
  StructuralGraph,
  StructuralGroup,
  StructuralNode,
  StructureComparison,
  StructureDifference
} from '@/lib/svg/graph';
import {
  attr,
  childElements,
  descendants,
  parseSvgTree,
  textContent,
  type SvgTree
} from '@/lib/svg/tree';

export interface AnalyzeOptions {
  /**
   * Legacy non-PlantUML path: resolve endpoints that id matching left unset
   * from the nearest node centre. Matches are tagged `geometric` (confidence 0.6).
   */
  geometricFallback?: boolean;
}

type GroupKind = 'node' | 'boundary' | 'edge' | 'label';

const DATA_KIND_MAP: Record<string, GroupKind> = {
  node: 'node',
  boundary: 'boundary',
  edge: 'edge',
  label: 'label'
};

// PlantUML marks entities, clusters and links through `class`.
const CLASS_KIND_MAP: Array<[string, GroupKind]> = [
  ['entity', 'node'],
  ['cluster', 'boundary'],
  ['link', 'edge']
];

const NON_VISUAL = new Set(['defs', 'marker', 'clippath', 'mask', 'pattern', 'symbol', 'metadata', 'style', 'script', 'title', 'desc']);
const NODE_SHAPES = new Set(['rect', 'circle', 'ellipse', 'polygon']);
const GROUP_SHAPES = ['rect', 'circle', 'ellipse', 'polygon', 'path', 'polyline'];
const EDGE_PRIMITIVES = new Set(['line', 'path', 'polyline']);
const RELEVANT_ATTRS = new Set(['class', 'fill', 'stroke']);

const ID_MATCH_EXACT = 1.0;
const ID_MATCH_SUBSTRING = 0.95;
const GEOMETRIC_MATCH = 0.6;
const PLANTUML_ID_PREFIXES = ['elem_', 'entity_', 'ent_'];

const ZERO_BOUNDS: Bounds = { x: 0, y: 0, width: 0, height: 0 };

interface Geometry {
  bounds: Bounds;
  center: Point;
  points: Point[];
}

interface Located<T> {
  order: number;
  value: T;
}

interface EdgeDraft {
  order: number;
  edge: StructuralEdge;
  points: Point[];
}

function num(value: string | undefined, fallback = 0): number {
  if (value === undefined) return fallback;
  const n = Number(value.trim());
  return Number.isFinite(n) ? n : fallback;
}

function parseLength(value: string | undefined, fallback: number): number {
  if (!value || /%/.test(value)) return fallback;
  const match = value.trim().match(/^-?\d+(?:\.\d+)?/);
  return match ? Number(match[0]) : fallback;
}

function pointsFrom(raw: string | undefined): Point[] {
  if (!raw) return [];
  const out: Point[] = [];
  const re = /(-?\d*\.?\d+(?:e-?\d+)?)[,\s]+(-?\d*\.?\d+(?:e-?\d+)?)/gi;
  let match: RegExpExecArray | null;
  while ((match = re.exec(raw)) !== null) {
    out.push([Number(match[1]), Number(match[2])]);
  }
  return out;
}

function boundsOf(points: Point[]): Bounds {
  if (!points.length) return { ...ZERO_BOUNDS };
  const xs = points.map((p) => p[0]);
  const ys = points.map((p) => p[1]);
  const minX = Math.min(...xs);
  const minY = Math.min(...ys);
  return { x: minX, y: minY, width: Math.max(...xs) - minX, height: Math.max(...ys) - minY };
}

function centerOfBounds(b: Bounds): Point {
  return [b.x + b.width / 2, b.y + b.height / 2];
}

function meanPoint(points: Point[]): Point {
  if (!points.length) return [0, 0];
  const sx = points.reduce((acc, p) => acc + p[0], 0);
  const sy = points.reduce((acc, p) => acc + p[1], 0);
  return [sx / points.length, sy / points.length];
}

function geometryOf(tree: SvgTree, index: number): Geometry {
  const node = tree.nodes[index];
  const get = (name: string) => attr(tree, index, name);
  switch (node?.tag) {
    case 'rect': {
      const bounds = { x: num(get('x')), y: num(get('y')), width: num(get('width')), height: num(get('height')) };
      return { bounds, center: centerOfBounds(bounds), points: [] };
    }
    case 'circle': {
      const cx = num(get('cx'));
      const cy = num(get('cy'));
      const r = num(get('r'));
      return { bounds: { x: cx - r, y: cy - r, width: r * 2, height: r * 2 }, center: [cx, cy], points: [] };
    }
    case 'ellipse': {
      const cx = num(get('cx'));
      const cy = num(get('cy'));
      const rx = num(get('rx'));
      const ry = num(get('ry'));
      return { bounds: { x: cx - rx, y: cy - ry, width: rx * 2, height: ry * 2 }, center: [cx, cy], points: [] };
    }
    case 'line': {
      const start: Point = [num(get('x1')), num(get('y1'))];
      const end: Point = [num(get('x2')), num(get('y2'))];
      return { bounds: boundsOf([start, end]), center: meanPoint([start, end]), points: [start, end] };
    }
    case 'polygon':
    case 'polyline': {
      const points = pointsFrom(get('points'));
      return { bounds: boundsOf(points), center: meanPoint(points), points };
    }
    case 'path': {
      const points = pointsFrom(get('d'));
      return { bounds: boundsOf(points), center: meanPoint(points), points };
    }
    default:
      return { bounds: { ...ZERO_BOUNDS }, center: [0, 0], points: [] };
  }
}

function relevantAttributes(tree: SvgTree, index: number): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of tree.nodes[index]?.attrs ?? []) {
    const lower = key.toLowerCase();
    if (RELEVANT_ATTRS.has(lower) || lower.startsWith('data-')) out[lower] = value;
  }
  return out;
}

function writtenTag(tree: SvgTree, index: number): string {
  const name = tree.nodes[index]?.name ?? '';
  const idx = name.indexOf(':');
  return idx >= 0 ? name.slice(idx + 1) : name;
}

function classifyGroup(tree: SvgTree, index: number): GroupKind | 'other' | null {
  const dataKind = attr(tree, index, 'data-kind');
  if (dataKind !== undefined && dataKind.trim() !== '') {
    return DATA_KIND_MAP[dataKind.trim().toLowerCase()] ?? 'other';
  }
  const cls = (attr(tree, index, 'class') ?? '').toLowerCase();
  for (const [token, kind] of CLASS_KIND_MAP) {
    if (cls.includes(token)) return kind;
  }
  return null;
}

function inferDiagramType(tree: SvgTree): string {
  const explicit = attr(tree, tree.root, 'data-diagram-type');
  if (explicit) return explicit;
  const metadata = tree.nodes.find((n) => n.tag === 'metadata');
  if (metadata) {
    const text = textContent(tree, metadata.index).toLowerCase();
    if (text.includes('sequence')) return 'sequence';
    if (text.includes('component')) return 'component';
    if (text.includes('container')) return 'container';
    if (text.includes('context')) return 'system_context';
  }
  return 'architecture';
}

function directText(tree: SvgTree, index: number): { label: string; first?: number; firstWithId?: number } {
  const texts = childElements(tree, index).filter((c) => tree.nodes[c]?.tag === 'text');
  const label = texts.map((t) => textContent(tree, t)).filter(Boolean).join(' ');
  return { label, first: texts[0], firstWithId: texts.find((t) => attr(tree, t, 'id')) };
}

/** Pick the element CSS can target: a shape's own id, else a descendant selector under the group. */
function shapeSelector(tree: SvgTree, groupIndex: number, groupId: string): { selector: string; geometrySource?: number } {
  const shapes = childElements(tree, groupIndex).filter((c) => GROUP_SHAPES.includes(tree.nodes[c]?.tag ?? ''));
  const rects = shapes.filter((c) => tree.nodes[c]?.tag === 'rect');
  const geometrySource = rects[0] ?? shapes[0];
  const withId = rects.find((c) => attr(tree, c, 'id')) ?? shapes.find((c) => attr(tree, c, 'id'));
  if (withId !== undefined) return { selector: `#${attr(tree, withId, 'id')}`, geometrySource };
  if (shapes[0] !== undefined) return { selector: `#${groupId} ${writtenTag(tree, shapes[0])}`, geometrySource };
  return { selector: `#${groupId}`, geometrySource };
}

function isBoundary(text: string, start: number, end: number): boolean {
  const before = start === 0 ? '' : text[start - 1];
  const after = end >= text.length ? '' : text[end];
  return !/[A-Za-z0-9]/.test(before ?? '') && !/[A-Za-z0-9]/.test(after ?? '');
}

function resolveFromId(edgeId: string, nodeIds: string[]): [string | null, string | null, number] {
  const known = new Set(nodeIds);
  const exact = edgeId.split('__').filter((part) => known.has(part));
  if (exact.length >= 2) return [exact[0] ?? null, exact[1] ?? null, ID_MATCH_EXACT];

  const lowerEdge = edgeId.toLowerCase();
  const matches: Array<{ pos: number; len: number; id: string }> = [];
  for (const id of nodeIds) {
    const needles = new Set([id]);
    for (const prefix of PLANTUML_ID_PREFIXES) {
      if (id.toLowerCase().startsWith(prefix) && id.length > prefix.length) needles.add(id.slice(prefix.length));
    }
    for (const needle of needles) {
      const lowerNeedle = needle.toLowerCase();
      let from = 0;
      while (from <= lowerEdge.length) {
        const pos = lowerEdge.indexOf(lowerNeedle, from);
        if (pos < 0) break;
        if (isBoundary(lowerEdge, pos, pos + lowerNeedle.length)) matches.push({ pos, len: lowerNeedle.length, id });
        from = pos + 1;
      }
    }
  }
  matches.sort((a, b) => a.pos - b.pos || b.len - a.len);
  const found: string[] = [];
  let cursor = 0;
  for (const m of matches) {
    if (m.pos < cursor) continue;
    cursor = m.pos + m.len;
    if (!found.includes(m.id)) found.push(m.id);
    if (found.length === 2) break;
  }
  return [found[0] ?? null, found[1] ?? null, ID_MATCH_SUBSTRING];
}

function nearestNode(point: Point, nodes: StructuralNode[]): string | null {
  let best: string | null = null;
  let bestDist = Number.POSITIVE_INFINITY;
  for (const node of nodes) {
    const dist = Math.hypot(node.center[0] - point[0], node.center[1] - point[1]);
    if (dist < bestDist) {
      bestDist = dist;
      best = node.id;
    }
  }
  return best;
}

function collectDuplicates(tree: SvgTree): string[] {
  const seen = new Map<string, number>();
  for (const node of tree.nodes) {
    const id = attr(tree, node.index, 'id');
    if (id) seen.set(id, (seen.get(id) ?? 0) + 1);
  }
  return [...seen.entries()].filter(([, count]) => count > 1).map(([id]) => id);
}

/**
 * Parse SVG markup into a structural graph of nodes, edges and groups.
 * Throws {@link ParseError} on malformed XML; any well-formed SVG yields a graph,
 * possibly with empty lists.
 */
export function analyze(svgText: string, svgId = 'svg-1', options: AnalyzeOptions = {}): StructuralGraph {
  const tree = parseSvgTree(svgText);
  const root = tree.root;
  const width = parseLength(attr(tree, root, 'width'), 960);
  const height = parseLength(attr(tree, root, 'height'), 720);
  const viewbox = attr(tree, root, 'viewBox') ?? `0 0 ${width} ${height}`;

  const claimed = new Set<number>();
  for (const node of tree.nodes) {
    const claims = NON_VISUAL.has(node.tag) || (node.tag === 'g' && classifyGroup(tree, node.index) !== null);
    if (claims) for (const d of descendants(tree, node.index)) claimed.add(d);
  }

  const nodes: Array<Located<StructuralNode>> = [];
  const groups: Array<Located<StructuralGroup>> = [];
  const edges: EdgeDraft[] = [];
  const index: Record<string, StructuralElement> = {};
  const register = (id: string, el: StructuralElement) => {
    if (!(id in index)) index[id] = el;
  };

  // First pass: classified groups.
  for (const node of tree.nodes) {
    if (node.tag !== 'g' || claimed.has(node.index)) continue;
    const id = attr(tree, node.index, 'id');
    const kind = classifyGroup(tree, node.index);
    if (!id || kind === null || kind === 'other') continue;

    const text = directText(tree, node.index);
    const attributes = relevantAttributes(tree, node.index);
    const dataRole = attr(tree, node.index, 'data-role');

    if (kind === 'node' || kind === 'label' || kind === 'boundary') {
      const shape = shapeSelector(tree, node.index, id);
      const geometry = shape.geometrySource !== undefined ? geometryOf(tree, shape.geometrySource) : geometryOf(tree, -1);

      if (kind === 'boundary') {
        const group: StructuralGroup = {
          id,
          element_type: 'boundary',
          selector: `#${id}`,
          label: text.label || dataRole || id,
          center: geometry.center,
          bounds: geometry.bounds,
          member_ids: [],
          attributes
        };
        groups.push({ order: node.index, value: group });
        register(id, group);
        continue;
      }

      let textSelector: string | undefined;
      if (text.firstWithId !== undefined) textSelector = `#${attr(tree, text.firstWithId, 'id')}`;
      else if (text.first !== undefined) textSelector = `#${id} text`;

      const animatable = kind === 'label'
        ? (text.firstWithId !== undefined ? `#${attr(tree, text.firstWithId, 'id')}` : `#${id}`)
        : shape.selector;
      const zone = attr(tree, node.index, 'data-zone');
      const structural: StructuralNode = {
        id,
        element_type: kind,
        selector: `#${id}`,
        label: text.label || id,
        center: geometry.center,
        bounds: geometry.bounds,
        role: kind === 'label' ? 'label' : 'node',
        ...(zone ? { zone } : {}),
        animatable_selector: animatable,
        ...(textSelector ? { text_selector: textSelector } : {}),
        attributes
      };
      nodes.push({ order: node.index, value: structural });
      register(id, structural);
      continue;
    }

    // kind === 'edge'
    const primitives = childElements(tree, node.index).filter((c) => EDGE_PRIMITIVES.has(tree.nodes[c]?.tag ?? ''));
    const primitive = primitives[0] ?? descendants(tree, node.index).find((c) => EDGE_PRIMITIVES.has(tree.nodes[c]?.tag ?? ''));
    if (primitive === undefined) continue;
    const geometry = geometryOf(tree, primitive);
    const primitiveId = attr(tree, primitive, 'id');
    const edge: StructuralEdge = {
      id,
      element_type: 'edge',
      selector: `#${id}`,
      source_id: null,
      target_id: null,
      edge_type: dataRole || 'directed',
      animatable_selector: primitiveId ? `#${primitiveId}` : `#${id} ${writtenTag(tree, primitive)}`,
      label: text.label,
      center: geometry.center,
      bounds: geometry.bounds,
      attributes
    };
    edges.push({ order: node.index, edge, points: geometry.points });
    register(id, edge);
  }

  // Second pass: standalone primitives no classified group has claimed.
  for (const node of tree.nodes) {
    if (node.index === root || claimed.has(node.index)) continue;
    const isEdge = EDGE_PRIMITIVES.has(node.tag);
    if (!isEdge && !NODE_SHAPES.has(node.tag)) continue;
    const id = attr(tree, node.index, 'id');
    if (!id || id in index) continue;
    const geometry = geometryOf(tree, node.index);
    const attributes = relevantAttributes(tree, node.index);

    if (isEdge) {
      const edge: StructuralEdge = {
        id,
        element_type: 'edge',
        selector: `#${id}`,
        source_id: null,
        target_id: null,
        edge_type: 'directed',
        animatable_selector: `#${id}`,
        label: '',
        center: geometry.center,
        bounds: geometry.bounds,
        attributes
      };
      edges.push({ order: node.index, edge, points: geometry.points });
      register(id, edge);
      continue;
    }

    const scope = node.parent ?? root;
    const sibling = childElements(tree, scope).find((c) => tree.nodes[c]?.tag === 'text' && textContent(tree, c));
    const structural: StructuralNode = {
      id,
      element_type: 'node',
      selector: `#${id}`,
      label: (sibling !== undefined ? textContent(tree, sibling) : '') || id,
      center: geometry.center,
      bounds: geometry.bounds,
      role: 'node',
      animatable_selector: `#${id}`,
      attributes
    };
    nodes.push({ order: node.index, value: structural });
    register(id, structural);
  }

  const orderedNodes = nodes.sort((a, b) => a.order - b.order).map((n) => n.value);
  const orderedGroups = groups.sort((a, b) => a.order - b.order).map((g) => g.value);
  const orderedEdges = edges.sort((a, b) => a.order - b.order);

  // Endpoint resolution: exact id parsing first, geometry only on request and only for gaps.
  const endpointNodes = orderedNodes.filter((n) => n.element_type === 'node');
  const endpointIds = endpointNodes.map((n) => n.id);
  for (const draft of orderedEdges) {
    const [source, target, confidence] = resolveFromId(draft.edge.id, endpointIds);
    const idMatch: EndpointMatch = { method: 'id', confidence };
    if (source) {
      draft.edge.source_id = source;
      draft.edge.source_match = idMatch;
    }
    if (target) {
      draft.edge.target_id = target;
      draft.edge.target_match = idMatch;
    }
    if (!options.geometricFallback || draft.points.length < 2 || !endpointNodes.length) continue;
    const geometric: EndpointMatch = { method: 'geometric', confidence: GEOMETRIC_MATCH };
    const first = draft.points[0];
    const last = draft.points[draft.points.length - 1];
    if (draft.edge.source_id === null && first) {
      draft.edge.source_id = nearestNode(first, endpointNodes);
      if (draft.edge.source_id !== null) draft.edge.source_match = geometric;
    }
    if (draft.edge.target_id === null && last) {
      draft.edge.target_id = nearestNode(last, endpointNodes);
      if (draft.edge.target_id !== null) draft.edge.target_match = geometric;
    }
  }

  // Group membership: bounding-box containment of node centres; the smallest container is the parent.
  for (const node of orderedNodes) {
    let parent: StructuralGroup | undefined;
    for (const group of orderedGroups) {
      const b = group.bounds;
      if (b.width <= 0 || b.height <= 0) continue;
      const [cx, cy] = node.center;
      if (cx >= b.x && cx <= b.x + b.width && cy >= b.y && cy <= b.y + b.height) {
        group.member_ids.push(node.id);
        if (!parent || b.width * b.height < parent.bounds.width * parent.bounds.height) parent = group;
      }
    }
    if (parent) node.parent_id = parent.id;
  }

  return {
    svg_id: svgId,
    diagram_type: inferDiagramType(tree),
    width,
    height,
    viewbox,
    nodes: orderedNodes,
    edges: orderedEdges.map((d) => d.edge),
    groups: orderedGroups,
    element_index: index,
    duplicate_ids: collectDuplicates(tree)
  };
}

function sortedDiff(a: Set<string>, b: Set<string>): string[] {
  return [...a].filter((id) => !b.has(id)).sort();
}

/** Set-based comparison of two graphs; ordering never matters. */
export function compareStructures(original: StructuralGraph, modified: StructuralGraph): StructureComparison {
  const differences: StructureDifference[] = [];
  const push = (type: StructureDifference['type'], severity: StructureDifference['severity'], ids: string[], message: string) => {
    if (ids.length) differences.push({ type, severity, ids, message: `${message}: ${ids.join(', ')}` });
  };

  const origNodes = new Set(original.nodes.map((n) => n.id));
  const modNodes = new Set(modified.nodes.map((n) => n.id));
  push('nodes_added', 'error', sortedDiff(modNodes, origNodes), 'New nodes were added');
  push('nodes_removed', 'error', sortedDiff(origNodes, modNodes), 'Nodes were removed');

  const origEdges = new Set(original.edges.map((e) => e.id));
  const modEdges = new Set(modified.edges.map((e) => e.id));
  push('edges_added', 'error', sortedDiff(modEdges, origEdges), 'New edges were added');
  push('edges_removed', 'error', sortedDiff(origEdges, modEdges), 'Edges were removed');

  const modEdgeById = new Map(modified.edges.map((e) => [e.id, e]));
  const reconnected = original.edges
    .filter((e) => {
      const other = modEdgeById.get(e.id);
      return other !== undefined && (other.source_id !== e.source_id || other.target_id !== e.target_id);
    })
    .map((e) => e.id)
    .sort();
  push('edge_reconnected', 'error', reconnected, 'Edges were reconnected');

  const modGroupById = new Map(modified.groups.map((g) => [g.id, g]));
  const drifted = original.groups
    .filter((g) => {
      const other = modGroupById.get(g.id);
      if (!other) return false;
      const a = [...new Set(g.member_ids)].sort().join('\u0000');
      const b = [...new Set(other.member_ids)].sort().join('\u0000');
      return a !== b;
    })
    .map((g) => g.id)
    .sort();
  push('group_membership_changed', 'warning', drifted, 'Group membership changed');

  return {
    is_equivalent: !differences.some((d) => d.severity === 'error'),
    differences,
    original_stats: { nodes: original.nodes.length, edges: original.edges.length, groups: original.groups.length },
    modified_stats: { nodes: modified.nodes.length, edges: modified.edges.length, groups: modified.groups.length }
  };
}
