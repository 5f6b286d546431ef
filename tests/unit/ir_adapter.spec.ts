import { describe, it, expect } from 'vitest';
import { renderVersionSvg, toIrVersion, versionFromSvg } from '@/lib/ir/adapter';
import { enrich } from '@/lib/enrich/enricher';
import { makeVersion } from '@/lib/ir/versioning';
import { analyze } from '@/lib/svg/analyzer';
import { SchemaError, ValidationError } from '@/lib/errors';
import { threeTier } from '../fixtures/ir';
import { loginPlan } from '../fixtures/plans';
import { NS } from '../fixtures/svg';

describe('toIrVersion', () => {
  it('lays zones out as rows and maps relationship semantics', () => {
    const version = toIrVersion(enrich(loginPlan), 'login');
    expect(version.ir_version).toBe(1);
    expect(version.ir.diagram.blocks.map((b) => [b.id, b.bbox.x, b.bbox.y])).toEqual([
      ['browser', 40, 60],
      ['auth', 40, 180],
      ['postgresql', 40, 300]
    ]);
    expect(version.ir.diagram.blocks[0]?.annotations).toMatchObject({ role: 'actor', confidence: 0.98 });
    expect(version.ir.diagram.edges[0]).toMatchObject({
      edge_id: 'auth__postgresql__inferred',
      relation_type: 'async',
      category: 'data_flow',
      mode: 'async',
      confidence: 0.5
    });
  });
});

describe('renderVersionSvg', () => {
  it('renders groups the analyzer reads back with the same ids', () => {
    const version = makeVersion('shop', threeTier(), null);
    const graph = analyze(renderVersionSvg(version));
    expect(graph.nodes.map((n) => n.id)).toEqual(version.ir.diagram.blocks.map((b) => b.id));
    expect(graph.nodes.map((n) => n.label)).toEqual(['Web App', 'Orders API', 'Orders DB']);
    expect(graph.edges.map((e) => [e.id, e.source_id, e.target_id])).toEqual([
      ['web__api', 'web', 'api'],
      ['api__db', 'api', 'db']
    ]);
    expect(graph.groups.map((g) => [g.id, g.member_ids])).toEqual([
      ['zone__clients', ['web']],
      ['zone__core', ['api', 'db']]
    ]);
    expect(graph.diagram_type).toBe('architecture');
  });

  it('marks hidden blocks without dropping them', () => {
    const doc = threeTier();
    doc.diagram.blocks[2] = { ...doc.diagram.blocks[2], hidden: true };
    const svg = renderVersionSvg(makeVersion('shop', doc, null));
    expect(svg).toContain('<g id="db" data-kind="node" data-zone="core" data-hidden="true" display="none">');
    expect(analyze(svg).nodes).toHaveLength(3);
  });
});

describe('versionFromSvg', () => {
  it('restores the exact version from embedded metadata', () => {
    const version = makeVersion('shop', threeTier(), null);
    expect(versionFromSvg(renderVersionSvg(version), 'shop')).toEqual(version);
  });

  it('falls back to the structural graph', () => {
    const svg = [
      `<svg xmlns="${NS}">`,
      '<g id="a" data-kind="node"><rect x="0" y="0" width="10" height="10"/><text>Alpha</text></g>',
      '<g id="b" data-kind="node"><rect x="50" y="0" width="10" height="10"/><text>Beta</text></g>',
      '<g id="a__b" data-kind="edge" data-role="calls"><line x1="10" y1="5" x2="50" y2="5"/></g>',
      '</svg>'
    ].join('');
    const version = versionFromSvg(svg, 'plain');
    expect(version.ir.diagram.blocks.map((b) => [b.id, b.text, b.type])).toEqual([
      ['a', 'Alpha', 'component'],
      ['b', 'Beta', 'component']
    ]);
    expect(version.ir.diagram.edges[0]).toMatchObject({ edge_id: 'a__b', from: 'a', to: 'b', relation_type: 'calls', confidence: 1 });
  });

  it('refuses edges whose endpoints cannot be resolved', () => {
    const svg = `<svg xmlns="${NS}"><line id="wire" x1="0" y1="0" x2="5" y2="5"/></svg>`;
    expect(() => versionFromSvg(svg, 'plain')).toThrow(ValidationError);
  });

  it('rejects malformed metadata', () => {
    const svg = `<svg xmlns="${NS}"><metadata id="ir_metadata">{"nodes": 3}</metadata></svg>`;
    expect(() => versionFromSvg(svg, 'broken')).toThrow(SchemaError);
  });
});
