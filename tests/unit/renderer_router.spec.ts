import { describe, it, expect } from 'vitest';
import { chooseRenderer, renderStructural, type DiagramRenderer } from '@/lib/renderers/router';
import { structuralFromEnriched, type StructuralIR } from '@/lib/codecs/structural';
import { enrich } from '@/lib/enrich/enricher';
import { NotFoundError } from '@/lib/errors';
import { loginPlan } from '../fixtures/plans';

function ir(kind: string, nodeKinds: string[]): StructuralIR {
  return {
    diagram_kind: kind,
    layout: 'top-down',
    nodes: nodeKinds.map((k, i) => ({ id: `n${i}`, kind: k, label: `Node ${i}` })),
    edges: nodeKinds.length > 1 ? [{ from: 'n0', to: 'n1', type: 'sync' }] : [],
    groups: []
  };
}

const lineCounter: DiagramRenderer = {
  name: 'plantuml',
  render: async (source) => `<svg data-lines="${source.split('\n').length}"/>`
};

describe('chooseRenderer', () => {
  it('honours a known override', () => {
    expect(chooseRenderer(ir('sequence', []), ' Structurizr ')).toEqual({ renderer: 'structurizr', reason: 'explicit override' });
  });

  it('ignores unknown overrides and routes by diagram kind', () => {
    expect(chooseRenderer(ir('sequence', []), 'graphviz')).toEqual({ renderer: 'mermaid', reason: "diagram kind 'sequence'" });
    expect(chooseRenderer(ir('Container', []))).toEqual({ renderer: 'structurizr', reason: "diagram kind 'container'" });
  });

  it('falls back to node kinds, then PlantUML', () => {
    expect(chooseRenderer(ir('deployment', ['service', 'database'])).renderer).toBe('structurizr');
    expect(chooseRenderer(ir('deployment', ['service', 'queue']))).toEqual({ renderer: 'plantuml', reason: 'default' });
    expect(chooseRenderer(ir('deployment', [])).renderer).toBe('plantuml');
  });

  it('sends enriched architecture plans to structurizr', () => {
    expect(chooseRenderer(structuralFromEnriched(enrich(loginPlan))).renderer).toBe('structurizr');
  });
});

describe('renderStructural', () => {
  it('encodes for the chosen renderer and returns its SVG', async () => {
    const result = await renderStructural(ir('deployment', ['service', 'queue']), [lineCounter]);
    expect(result.renderer).toBe('plantuml');
    expect(result.source.startsWith('@startuml\n')).toBe(true);
    expect(result.svg).toBe('<svg data-lines="7"/>');
    expect(console.info).toHaveBeenCalledWith('[RENDER_ROUTE]', { renderer: 'plantuml', reason: 'default', nodes: 2 });
  });

  it('fails when no renderer is registered for the choice', async () => {
    await expect(renderStructural(ir('sequence', ['actor']), [lineCounter])).rejects.toBeInstanceOf(NotFoundError);
  });
});
