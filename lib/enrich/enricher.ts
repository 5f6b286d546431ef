import { ENGINE_DEFAULTS } from '@/config/engine';
import { EnrichmentError, ValidationError, issuesFromZod } from '@/lib/errors';
import { inferConnections } from '@/lib/enrich/connectivity';
import { labelKey, mermaidIdentifier, uniqueEdgeId, uniqueSlug } from '@/lib/enrich/ids';
import { resolveIntent, type Density } from '@/lib/enrich/palette';
import {
  EnrichedIRSchema,
  MinimalPlanSchema,
  type EnrichedEdge,
  type EnrichedIR,
  type EnrichedNode,
  type MinimalPlan,
  type NodeStyle,
  type ValidationMessage
} from '@/lib/enrich/schema';
import {
  EDGE_PRESETS,
  FONT_FAMILY,
  LAYOUT_MAP,
  MERMAID_TYPE_BY_TYPE,
  PLANTUML_SHAPE_BY_TYPE,
  ROLE_BY_ZONE,
  SHAPE_BY_TYPE,
  SIZE_BY_TYPE,
  STEREOTYPE_BY_ROLE,
  TYPE_BY_ROLE,
  ZONE_KEYS,
  paletteAt,
  roleFromLabel,
  type ZoneKey
} from '@/lib/enrich/tables';
import { emitEnrichmentMetrics } from '@/lib/metrics/telemetry';

export const ENRICHER_ID = 'diagram-ir-engine/enricher';

function diagramType(plan: MinimalPlan): string {
  const explicit = plan.diagram_type?.trim();
  if (explicit) return explicit;
  return plan.diagram_views?.[0]?.trim() || 'diagram';
}

function layoutOf(plan: MinimalPlan): string {
  const hint = plan.layout ?? plan.visual_hints?.layout ?? 'top-down';
  const normalized = hint.trim().replace(/ /g, '-').toLowerCase();
  return LAYOUT_MAP[normalized] ?? 'top-down';
}

function densityFor(nodeCount: number): Density {
  if (nodeCount >= 10) return 'compact';
  if (nodeCount <= 3) return 'spacious';
  return 'balanced';
}

class Enrichment {
  private readonly palette: string[];
  private readonly zoneOrder: ZoneKey[];
  private readonly zoneColors = new Map<ZoneKey, { fill: string; border: string }>();
  private readonly nodeIds = new Set<string>();
  private readonly edgeIds = new Set<string>();
  private readonly nodeLookup = new Map<string, EnrichedNode>();
  private readonly nodes: EnrichedNode[] = [];
  private readonly edges: EnrichedEdge[] = [];
  private readonly validation: ValidationMessage[] = [];
  private readonly intent: ReturnType<typeof resolveIntent>;

  constructor(private readonly plan: MinimalPlan) {
    this.intent = resolveIntent(plan.aesthetic_intent);
    this.palette = this.intent.palette;
    this.zoneOrder = ZONE_KEYS.filter((zone) => (plan.zones[zone] ?? []).length > 0);
    this.zoneOrder.forEach((zone, idx) => {
      this.zoneColors.set(zone, { fill: paletteAt(this.palette, idx), border: paletteAt(this.palette, idx + 1) });
    });
  }

  build(): EnrichedIR {
    for (const zone of this.zoneOrder) {
      for (const label of this.plan.zones[zone] ?? []) this.addNode(label, zone, false);
    }
    for (const rel of this.plan.relationships) {
      for (const label of [rel.from, rel.to]) {
        if (this.nodeLookup.has(labelKey(label))) continue;
        this.addNode(label, null, true);
        this.validation.push({ severity: 'warning', message: `Inferred node '${label}' from relationship endpoints` });
        console.warn('[ENRICH_INFERRED_NODE]', { label, confidence: 0.8 });
      }
    }
    this.addExplicitEdges();
    const inferred = inferConnections({
      nodes: this.nodes,
      edges: this.edges,
      zoneOrder: this.zoneOrder,
      palette: this.palette,
      edgeIds: this.edgeIds
    });
    this.edges.push(...inferred.edges);

    const rank = new Map(this.zoneOrder.map((zone, idx) => [zone, idx]));
    const zoneRank = (n: EnrichedNode) => (n.zone ? rank.get(n.zone) ?? rank.size : rank.size);
    this.nodes.sort((a, b) => {
      const byZone = zoneRank(a) - zoneRank(b);
      if (byZone) return byZone;
      const la = a.label.toLowerCase();
      const lb = b.label.toLowerCase();
      return la < lb ? -1 : la > lb ? 1 : 0;
    });

    const layout = layoutOf(this.plan);
    return {
      diagram_type: diagramType(this.plan),
      layout,
      zone_order: this.zoneOrder,
      nodes: this.nodes,
      edges: this.edges,
      nodeIntent: this.nodeIntent(),
      edgeIntent: this.edgeIntent(),
      globalIntent: {
        palette: this.palette,
        layout,
        density: this.intent.density ?? densityFor(this.nodes.length),
        mood: this.intent.mood,
        contrast: this.intent.contrast
      },
      metadata: {
        generated_by: ENRICHER_ID,
        validation: [...this.validation, { severity: 'info', message: 'Enriched deterministically' }],
        source_system: this.plan.system_name ?? null,
        inferences: inferred.inferences
      }
    };
  }

  private addNode(rawLabel: string, zone: ZoneKey | null, inferred: boolean): EnrichedNode {
    const label = rawLabel.trim() || 'node';
    const key = labelKey(label);
    const existing = this.nodeLookup.get(key);
    if (existing) return existing;

    const role = zone ? ROLE_BY_ZONE[zone] : roleFromLabel(label);
    const type = TYPE_BY_ROLE[role];
    const colors = (zone && this.zoneColors.get(zone)) || {
      fill: paletteAt(this.palette, 0),
      border: paletteAt(this.palette, 1)
    };
    const style: NodeStyle = {
      fillColor: colors.fill,
      borderColor: colors.border,
      textColor: paletteAt(this.palette, -1),
      borderWidth: 2,
      fontSize: 12,
      fontFamily: FONT_FAMILY,
      padding: type === 'actor' ? 6 : type === 'data_store' ? 10 : 8
    };
    const node: EnrichedNode = {
      node_id: uniqueSlug(label, this.nodeIds, 'node'),
      label,
      role,
      zone,
      type,
      stereotype: STEREOTYPE_BY_ROLE[role],
      shape: SHAPE_BY_TYPE[type],
      size_hint: SIZE_BY_TYPE[type],
      node_style: style,
      rendering_hints: {
        plantuml: { plantuml_shape: PLANTUML_SHAPE_BY_TYPE[type], plantuml_color: colors.fill, plantuml_label: label },
        mermaid: { mermaid_type: MERMAID_TYPE_BY_TYPE[type], mermaid_id: mermaidIdentifier(label) }
      },
      metadata: inferred
        ? { confidence: 0.8, reason: 'derived from relationship', source: 'relationships' }
        : { confidence: 0.98, reason: 'explicit zone membership', source: `zones.${zone ?? ''}` }
    };
    this.nodes.push(node);
    this.nodeLookup.set(key, node);
    return node;
  }

  private requireNode(label: string): EnrichedNode {
    return this.nodeLookup.get(labelKey(label)) ?? this.addNode(label, null, true);
  }

  private addExplicitEdges(): void {
    for (const rel of this.plan.relationships) {
      const from = this.requireNode(rel.from);
      const to = this.requireNode(rel.to);
      const preset = EDGE_PRESETS[rel.type];
      const color = paletteAt(this.palette, preset.paletteIndex);
      const description = rel.description?.trim() || rel.label?.trim();
      this.edges.push({
        edge_id: uniqueEdgeId(`${from.node_id}__${to.node_id}__${rel.type}`, this.edgeIds),
        from_id: from.node_id,
        to_id: to.node_id,
        rel_type: rel.type,
        label: description || `${rel.from} -> ${rel.to}`,
        style: preset.style,
        color,
        width: 2,
        opacity: 1,
        arrowhead: preset.arrowhead,
        text_style: { fontSize: 11, fontFamily: FONT_FAMILY, textColor: color },
        curvature: preset.curvature,
        confidence: description ? 0.95 : 0.85,
        reason: description ? 'explicit relationship' : 'relationship inferred',
        inferred: false
      });
    }
  }

  private nodeIntent(): EnrichedIR['nodeIntent'] {
    const intent: EnrichedIR['nodeIntent'] = {};
    for (const node of this.nodes) {
      if (node.role in intent) continue;
      intent[node.role] = { shape: node.shape, default_style: { ...node.node_style }, stereotype: node.stereotype };
    }
    return intent;
  }

  private edgeIntent(): EnrichedIR['edgeIntent'] {
    const intent: EnrichedIR['edgeIntent'] = {};
    for (const edge of this.edges) {
      if (edge.rel_type in intent) continue;
      intent[edge.rel_type] = {
        style: edge.style,
        color: edge.color,
        width: edge.width,
        arrowhead: edge.arrowhead,
        text_style: { ...edge.text_style }
      };
    }
    return intent;
  }
}

/**
 * Turn a minimal zones/relationships plan into a styled, connected IR.
 *
 * Structure fails closed: unknown zone keys or relationship types are a
 * {@link ValidationError}. Aesthetics fail open. The result is checked against
 * its own schema and an {@link EnrichmentError} means a rule produced a bad document.
 */
export function enrich(plan: unknown): EnrichedIR {
  const parsed = MinimalPlanSchema.safeParse(plan);
  if (!parsed.success) {
    throw new ValidationError('Invalid enrichment plan', issuesFromZod(parsed.error));
  }
  const draft = new Enrichment(parsed.data).build();
  const checked = EnrichedIRSchema.safeParse(draft);
  if (!checked.success) {
    throw new EnrichmentError(issuesFromZod(checked.error));
  }
  if (ENGINE_DEFAULTS.metrics) emitEnrichmentMetrics(checked.data);
  return checked.data;
}
