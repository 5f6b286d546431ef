import { structuralIrToMermaid } from '@/lib/codecs/mermaid';
import { structuralIrToPlantuml } from '@/lib/codecs/plantuml';
import { structuralIrToStructurizrJson } from '@/lib/codecs/structurizr';
import type { StructuralIR } from '@/lib/codecs/structural';
import { NotFoundError } from '@/lib/errors';

export const RENDERER_NAMES = ['plantuml', 'mermaid', 'structurizr'] as const;
export type RendererName = (typeof RENDERER_NAMES)[number];

/** External renderer binary or service: source text in, SVG out. */
export interface DiagramRenderer {
  name: RendererName;
  render(source: string): Promise<string>;
}

export interface RendererChoice {
  renderer: RendererName;
  reason: string;
}

const MERMAID_KINDS = new Set(['sequence', 'flow', 'flowchart', 'story']);
const STRUCTURIZR_KINDS = new Set(['architecture', 'system', 'system_context', 'container', 'component']);
const STRUCTURIZR_NODE_KINDS = new Set([
  'person', 'actor', 'system', 'container', 'component', 'database', 'data_store', 'external', 'service', 'api'
]);

function isRendererName(value: string): value is RendererName {
  return RENDERER_NAMES.some((name) => name === value);
}

/** Explicit override, then diagram kind, then node kinds; PlantUML otherwise. */
export function chooseRenderer(ir: StructuralIR, override?: string): RendererChoice {
  const forced = override?.trim().toLowerCase();
  if (forced && isRendererName(forced)) return { renderer: forced, reason: 'explicit override' };
  const kind = ir.diagram_kind.toLowerCase();
  if (MERMAID_KINDS.has(kind)) return { renderer: 'mermaid', reason: `diagram kind '${kind}'` };
  if (STRUCTURIZR_KINDS.has(kind)) return { renderer: 'structurizr', reason: `diagram kind '${kind}'` };
  if (ir.nodes.length && ir.nodes.every((n) => STRUCTURIZR_NODE_KINDS.has(n.kind.toLowerCase()))) {
    return { renderer: 'structurizr', reason: 'node kinds map to C4 elements' };
  }
  return { renderer: 'plantuml', reason: 'default' };
}

export function encodeFor(renderer: RendererName, ir: StructuralIR): string {
  switch (renderer) {
    case 'mermaid':
      return structuralIrToMermaid(ir);
    case 'structurizr':
      return structuralIrToStructurizrJson(ir);
    default:
      return structuralIrToPlantuml(ir);
  }
}

export interface RenderedDiagram extends RendererChoice {
  source: string;
  svg: string;
}

export async function renderStructural(
  ir: StructuralIR,
  renderers: readonly DiagramRenderer[],
  override?: string
): Promise<RenderedDiagram> {
  const choice = chooseRenderer(ir, override);
  const renderer = renderers.find((r) => r.name === choice.renderer);
  if (!renderer) throw new NotFoundError(`No renderer registered for '${choice.renderer}'`);
  const source = encodeFor(choice.renderer, ir);
  console.info('[RENDER_ROUTE]', { renderer: choice.renderer, reason: choice.reason, nodes: ir.nodes.length });
  const svg = await renderer.render(source);
  return { ...choice, source, svg };
}
