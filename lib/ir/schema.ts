import { z } from 'zod';
import { issuesFromZod, type IssuePath } from '@/lib/errors';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const EDGE_DIRECTIONS = ['unidirectional', 'bidirectional'] as const;

export const EDGE_CATEGORIES = [
  'data_flow',
  'user_traffic',
  'replication',
  'auth',
  'secret_distribution',
  'monitoring',
  'control',
  'metadata',
  'network'
] as const;

export const EDGE_MODES = ['sync', 'async', 'broadcast', 'conditional'] as const;

export const BBoxSchema = z.object({
  x: z.number(),
  y: z.number(),
  w: z.number().min(0),
  h: z.number().min(0)
});

export const StyleValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const BlockSchema = z
  .object({
    id: z.string().min(1),
    type: z.string().min(1),
    text: z.string(),
    bbox: BBoxSchema,
    style: z.record(StyleValueSchema),
    annotations: z.record(JsonValueSchema),
    version: z.number().int().min(1),
    hidden: z.boolean().optional(),
    zone: z.string().optional()
  })
  .strict();

export const WireEdgeSchema = z
  .object({
    edge_id: z.string().min(1),
    from: z.string().min(1),
    to: z.string().min(1),
    relation_type: z.string().min(1),
    direction: z.enum(EDGE_DIRECTIONS),
    category: z.enum(EDGE_CATEGORIES),
    mode: z.enum(EDGE_MODES),
    label: z.string(),
    confidence: z.number().min(0).max(1)
  })
  .strict();

export const DiagramSchema = z
  .object({
    id: z.string().min(1),
    type: z.string().min(1),
    blocks: z.array(BlockSchema),
    edges: z.array(WireEdgeSchema)
  })
  .strict();

export const IRDocumentSchema = z.object({ diagram: DiagramSchema }).strict();

function firstDuplicate(values: string[]): string | undefined {
  const seen = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) return value;
    seen.add(value);
  }
  return undefined;
}

export const IRVersionSchema = z
  .object({
    diagram_id: z.string().min(1),
    ir_version: z.number().int().min(1),
    parent_version: z.number().int().min(1).nullable(),
    ir: IRDocumentSchema
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.parent_version !== null && value.parent_version >= value.ir_version) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['parent_version'],
        message: `parent_version ${value.parent_version} must be lower than ir_version ${value.ir_version}`
      });
    }
    const dupBlock = firstDuplicate(value.ir.diagram.blocks.map((b) => b.id));
    if (dupBlock !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ir', 'diagram', 'blocks'],
        message: `duplicate block id '${dupBlock}'`
      });
    }
    const dupEdge = firstDuplicate(value.ir.diagram.edges.map((e) => e.edge_id));
    if (dupEdge !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ir', 'diagram', 'edges'],
        message: `duplicate edge id '${dupEdge}'`
      });
    }
    const blockIds = new Set(value.ir.diagram.blocks.map((b) => b.id));
    value.ir.diagram.edges.forEach((edge, i) => {
      for (const end of ['from', 'to'] as const) {
        if (blockIds.has(edge[end])) continue;
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['ir', 'diagram', 'edges', i, end],
          message: `edge '${edge.edge_id}' references unknown block '${edge[end]}'`
        });
      }
    });
  });

export type BBox = z.infer<typeof BBoxSchema>;
export type StyleValue = z.infer<typeof StyleValueSchema>;
export type Block = z.infer<typeof BlockSchema>;
export type WireEdge = z.infer<typeof WireEdgeSchema>;
export type EdgeDirection = WireEdge['direction'];
export type EdgeCategory = WireEdge['category'];
export type EdgeMode = WireEdge['mode'];
export type Diagram = z.infer<typeof DiagramSchema>;
export type IRDocument = z.infer<typeof IRDocumentSchema>;
export type IRVersion = z.infer<typeof IRVersionSchema>;

export type ValidationResult = { ok: true; value: IRVersion } | { ok: false; errors: IssuePath[] };

/** Structural validation of a wire-format IRVersion. Never coerces. */
export function validate(payload: unknown): ValidationResult {
  const parsed = IRVersionSchema.safeParse(payload);
  if (parsed.success) return { ok: true, value: parsed.data };
  return { ok: false, errors: issuesFromZod(parsed.error) };
}
