import { z } from 'zod';
import { SchemaError, issuesFromZod } from '@/lib/errors';
import {
  BlockSchema,
  type Diagram,
  type IRDocument,
  type IRVersion,
  type JsonValue,
  validate
} from '@/lib/ir/schema';

export interface PatchLogEntry {
  op: string;
  block_id: string;
  before?: JsonValue;
  after?: JsonValue;
}

export interface DiffSummary {
  blocks_before: number;
  blocks_after: number;
  edges_before: number;
  edges_after: number;
  text: string;
}

export function cloneIR<T>(value: T): T {
  return structuredClone(value);
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export function bumpVersion(parentVersion: number | null): number {
  if (parentVersion === null) return 1;
  if (!Number.isInteger(parentVersion) || parentVersion < 1) {
    throw new SchemaError([{ path: 'parent_version', message: `expected integer >= 1, got ${parentVersion}` }]);
  }
  return parentVersion + 1;
}

/**
 * Mint a new immutable version. `ir_version` is derived from the parent;
 * the payload is validated as-is and rejected with {@link SchemaError} on any issue.
 */
export function makeVersion(diagramId: string, ir: IRDocument, parentVersion: number | null): IRVersion {
  const candidate = {
    diagram_id: diagramId,
    ir_version: bumpVersion(parentVersion),
    parent_version: parentVersion,
    ir: cloneIR(ir)
  };
  const result = validate(candidate);
  if (!result.ok) throw new SchemaError(result.errors);
  return deepFreeze(result.value);
}

const LegacyRelationSchema = z
  .object({
    edge_id: z.string().min(1).optional(),
    from: z.string().min(1),
    to: z.string().min(1),
    label: z.string().optional(),
    relation_type: z.string().min(1).optional(),
    direction: z.enum(['unidirectional', 'bidirectional']).optional(),
    category: z.string().optional(),
    mode: z.string().optional(),
    confidence: z.number().optional()
  })
  .passthrough();

const LegacyDiagramSchema = z.object({
  id: z.string().min(1).optional(),
  type: z.string().min(1).optional(),
  blocks: z.array(BlockSchema).default([]),
  edges: z.array(LegacyRelationSchema).optional(),
  relations: z.array(LegacyRelationSchema).optional()
});

const LegacyPayloadSchema = z.object({ diagram: LegacyDiagramSchema });

function isWrapped(payload: unknown): boolean {
  return typeof payload === 'object' && payload !== null && 'ir' in payload && 'ir_version' in payload;
}

function legacyDiagram(raw: z.infer<typeof LegacyDiagramSchema>, diagramId: string): Diagram {
  const relations = raw.edges ?? raw.relations ?? [];
  const used = new Set<string>();
  const edges = relations.map((rel) => {
    const base = rel.edge_id ?? `${rel.from}__${rel.to}`;
    let edgeId = base;
    for (let n = 2; used.has(edgeId); n += 1) edgeId = `${base}__${n}`;
    used.add(edgeId);
    return {
      edge_id: edgeId,
      from: rel.from,
      to: rel.to,
      relation_type: rel.relation_type ?? 'sync',
      direction: rel.direction ?? 'unidirectional',
      category: rel.category ?? 'control',
      mode: rel.mode ?? 'sync',
      label: rel.label ?? '',
      confidence: rel.confidence ?? 1
    };
  });
  const diagram = { id: raw.id ?? diagramId, type: raw.type ?? 'architecture', blocks: raw.blocks, edges };
  // legacy category/mode strings still have to name a known enum member
  const result = validate({ diagram_id: diagramId, ir_version: 1, parent_version: null, ir: { diagram } });
  if (!result.ok) throw new SchemaError(result.errors, 'Legacy diagram upgrade failed');
  return result.value.ir.diagram;
}

export interface UpgradeOptions {
  diagramId?: string;
}

/**
 * Accept either a full wire-format version or a bare legacy `{diagram}` payload.
 * The legacy form becomes version 1 with no parent; this is the only implicit migration.
 */
export function upgrade(payload: unknown, options: UpgradeOptions = {}): IRVersion {
  if (isWrapped(payload)) {
    const result = validate(payload);
    if (!result.ok) throw new SchemaError(result.errors);
    return deepFreeze(result.value);
  }
  const legacy = LegacyPayloadSchema.safeParse(payload);
  if (!legacy.success) {
    throw new SchemaError(issuesFromZod(legacy.error), 'Unrecognized IR payload');
  }
  const diagramId = options.diagramId ?? legacy.data.diagram.id;
  if (!diagramId) {
    throw new SchemaError([{ path: 'diagram/id', message: 'legacy payload carries no diagram id and none was supplied' }]);
  }
  const diagram = legacyDiagram(legacy.data.diagram, diagramId);
  const version = makeVersion(diagramId, { diagram }, null);
  console.info('[IR_UPGRADE]', {
    diagram_id: diagramId,
    ir_version: version.ir_version,
    blocks: diagram.blocks.length,
    edges: diagram.edges.length,
    renamed_relations: legacy.data.diagram.edges === undefined && legacy.data.diagram.relations !== undefined
  });
  return version;
}

export function fromJson(text: string, options: UpgradeOptions = {}): IRVersion {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (err) {
    throw new SchemaError([{ path: '<root>', message: err instanceof Error ? err.message : String(err) }], 'Invalid IR JSON');
  }
  return upgrade(payload, options);
}

export function toJson(version: IRVersion, indent?: number): string {
  return JSON.stringify(version, null, indent);
}

export function diffSummary(before: IRDocument, after: IRDocument): DiffSummary {
  const blocksBefore = before.diagram.blocks.length;
  const blocksAfter = after.diagram.blocks.length;
  const edgesBefore = before.diagram.edges.length;
  const edgesAfter = after.diagram.edges.length;
  return {
    blocks_before: blocksBefore,
    blocks_after: blocksAfter,
    edges_before: edgesBefore,
    edges_after: edgesAfter,
    text: `blocks=${blocksBefore}->${blocksAfter}; relations=${edgesBefore}->${edgesAfter}`
  };
}
