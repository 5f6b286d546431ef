import { connectivityStats } from '@/lib/enrich/connectivity';
import type { EnrichedIR } from '@/lib/enrich/schema';

export interface EnrichmentMetrics {
  nodes: number; edges: number;
  explicitEdges: number; inferredEdges: number;
  byRule: Record<string, number>;
  isolationRatio: number;
  inferredNodes: number;
}

export function collectEnrichmentMetrics(ir: EnrichedIR): EnrichmentMetrics {
  const byRule: Record<string, number> = {};
  for (const record of ir.metadata.inferences) {
    byRule[record.rule] = (byRule[record.rule] ?? 0) + 1;
  }
  const inferredEdges = ir.edges.filter((e) => e.inferred).length;
  return {
    nodes: ir.nodes.length,
    edges: ir.edges.length,
    explicitEdges: ir.edges.length - inferredEdges,
    inferredEdges,
    byRule,
    isolationRatio: connectivityStats(ir).isolation_ratio,
    inferredNodes: ir.nodes.filter((n) => n.metadata.source === 'relationships').length
  };
}

export function emitEnrichmentMetrics(ir: EnrichedIR): void {
  console.info('[ENRICH_METRICS]', collectEnrichmentMetrics(ir));
}
