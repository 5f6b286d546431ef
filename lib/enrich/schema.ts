import { z } from 'zod';
import { NODE_TYPES, RELATIONSHIP_TYPES, ROLES, ZONE_KEYS } from '@/lib/enrich/tables';

const LabelList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value : [value]).map((s) => s.trim()).filter((s) => s.length > 0));

export const ZonesSchema = z
  .object({
    clients: LabelList.optional(),
    edge: LabelList.optional(),
    core_services: LabelList.optional(),
    external_services: LabelList.optional(),
    data_stores: LabelList.optional()
  })
  .strict();

const RelationshipTypeSchema = z
  .string()
  .transform((s) => s.trim().toLowerCase())
  .pipe(z.enum(RELATIONSHIP_TYPES));

export const RelationshipSchema = z.object({
  from: z.string().trim().min(1),
  to: z.string().trim().min(1),
  type: RelationshipTypeSchema.default('sync'),
  description: z.string().optional(),
  label: z.string().optional()
});

export const MinimalPlanSchema = z.object({
  system_name: z.string().optional(),
  diagram_type: z.string().optional(),
  diagram_views: z.array(z.string()).optional(),
  layout: z.string().optional(),
  visual_hints: z.object({ layout: z.string().optional() }).passthrough().optional(),
  zones: ZonesSchema.default({}),
  relationships: z.array(RelationshipSchema).default([]),
  // Checked leniently by the palette resolver; bad aesthetics never reject a plan.
  aesthetic_intent: z.unknown().optional()
});

export type MinimalPlanInput = z.input<typeof MinimalPlanSchema>;
export type MinimalPlan = z.output<typeof MinimalPlanSchema>;
export type Relationship = z.output<typeof RelationshipSchema>;

const Confidence = z.number().min(0).max(1);
const HexColor = z.string().regex(/^#[0-9A-F]{6}$/);

export const NodeStyleSchema = z.object({
  fillColor: HexColor,
  borderColor: HexColor,
  textColor: HexColor,
  borderWidth: z.number(),
  fontSize: z.number(),
  fontFamily: z.string(),
  padding: z.number()
});

export const EnrichedNodeSchema = z
  .object({
    node_id: z.string().regex(/^[a-z0-9_]+$/),
    label: z.string().min(1),
    role: z.enum(ROLES),
    zone: z.enum(ZONE_KEYS).nullable(),
    type: z.enum(NODE_TYPES),
    stereotype: z.string(),
    shape: z.string(),
    size_hint: z.enum(['small', 'medium', 'large']),
    node_style: NodeStyleSchema,
    rendering_hints: z.object({
      plantuml: z.object({ plantuml_shape: z.string(), plantuml_color: HexColor, plantuml_label: z.string() }),
      mermaid: z.object({ mermaid_type: z.string(), mermaid_id: z.string().regex(/^[A-Za-z][A-Za-z0-9]*$/) })
    }),
    metadata: z.object({ confidence: Confidence, reason: z.string().min(1), source: z.string() })
  })
  .strict();

export const TextStyleSchema = z.object({ fontSize: z.number(), fontFamily: z.string(), textColor: HexColor });

export const EnrichedEdgeSchema = z
  .object({
    edge_id: z.string().min(1),
    from_id: z.string().min(1),
    to_id: z.string().min(1),
    rel_type: z.enum(RELATIONSHIP_TYPES),
    label: z.string(),
    style: z.enum(['solid', 'dashed']),
    color: HexColor,
    width: z.number().positive(),
    opacity: z.number().min(0).max(1),
    arrowhead: z.enum(['normal', 'open']),
    text_style: TextStyleSchema,
    curvature: z.number(),
    confidence: Confidence,
    reason: z.string().min(1),
    inferred: z.boolean()
  })
  .strict();

export const INFERENCE_RULES = ['zone_cascade', 'tech_dependency', 'completion_guard'] as const;

export const InferenceRecordSchema = z.object({
  edge_id: z.string(),
  from_id: z.string(),
  to_id: z.string(),
  rule: z.enum(INFERENCE_RULES),
  reason: z.string().min(1),
  confidence: z.union([z.literal(0.3), z.literal(0.5), z.literal(0.7)])
});

export const ValidationMessageSchema = z.object({
  severity: z.enum(['info', 'warning']),
  message: z.string()
});

export const MOODS = ['minimal', 'vibrant', 'formal', 'playful'] as const;
export const DENSITIES = ['compact', 'balanced', 'spacious'] as const;
export const CONTRASTS = ['low', 'medium', 'high'] as const;

export const GlobalIntentSchema = z.object({
  palette: z.array(HexColor).min(2).max(8),
  layout: z.string(),
  density: z.enum(DENSITIES),
  mood: z.enum(MOODS),
  contrast: z.enum(CONTRASTS)
});

export const EnrichedIRSchema = z
  .object({
    diagram_type: z.string().min(1),
    layout: z.string().min(1),
    zone_order: z.array(z.enum(ZONE_KEYS)),
    nodes: z.array(EnrichedNodeSchema),
    edges: z.array(EnrichedEdgeSchema),
    nodeIntent: z.record(z.object({ shape: z.string(), default_style: NodeStyleSchema, stereotype: z.string() })),
    edgeIntent: z.record(
      z.object({ style: z.string(), color: HexColor, width: z.number(), arrowhead: z.string(), text_style: TextStyleSchema })
    ),
    globalIntent: GlobalIntentSchema,
    metadata: z.object({
      generated_by: z.string(),
      validation: z.array(ValidationMessageSchema),
      source_system: z.string().nullable(),
      inferences: z.array(InferenceRecordSchema)
    })
  })
  .strict()
  .superRefine((value, ctx) => {
    const ids = new Set(value.nodes.map((n) => n.node_id));
    if (ids.size !== value.nodes.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['nodes'], message: 'duplicate node_id' });
    }
    const edgeIds = new Set(value.edges.map((e) => e.edge_id));
    if (edgeIds.size !== value.edges.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['edges'], message: 'duplicate edge_id' });
    }
    value.edges.forEach((edge, idx) => {
      for (const key of ['from_id', 'to_id'] as const) {
        if (!ids.has(edge[key])) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['edges', idx, key], message: `unknown node '${edge[key]}'` });
        }
      }
    });
  });

export type NodeStyle = z.infer<typeof NodeStyleSchema>;
export type TextStyle = z.infer<typeof TextStyleSchema>;
export type EnrichedNode = z.infer<typeof EnrichedNodeSchema>;
export type EnrichedEdge = z.infer<typeof EnrichedEdgeSchema>;
export type InferenceRule = (typeof INFERENCE_RULES)[number];
export type InferenceRecord = z.infer<typeof InferenceRecordSchema>;
export type ValidationMessage = z.infer<typeof ValidationMessageSchema>;
export type GlobalIntent = z.infer<typeof GlobalIntentSchema>;
export type EnrichedIR = z.infer<typeof EnrichedIRSchema>;
