import { describe, it, expect } from 'vitest';
import { structuralIrToPlantuml } from '@/lib/codecs/plantuml';
import { structuralIrToMermaid } from '@/lib/codecs/mermaid';
import { structuralIrToStructurizrJson } from '@/lib/codecs/structurizr';
import { fingerprint, canonicalJson } from '@/lib/codecs/fingerprint';
import { normalizeStructural, structuralFromVersion, type StructuralIR } from '@/lib/codecs/structural';
import { makeVersion } from '@/lib/ir/versioning';
import { threeTier } from '../fixtures/ir';

function twoNode(dbLabel = 'Orders DB'): StructuralIR {
  return {
    diagram_kind: 'component',
    layout: 'top-down',
    nodes: [
      { id: 'api', kind: 'service', label: 'Orders API' },
      { id: 'db', kind: 'database', label: dbLabel }
    ],
    edges: [{ from: 'api', to: 'db', type: 'sync' }],
    groups: []
  };
}

const FINGERPRINT_LINE = /^' fingerprint: [0-9a-f]{16}$/;

describe('structuralIrToPlantuml', () => {
  it('renders one arrow per edge and a trailing fingerprint', () => {
    const text = structuralIrToPlantuml(twoNode());
    const lines = text.split('\n');
    expect(lines.slice(0, -1)).toEqual([
      '@startuml',
      'top to bottom direction',
      'component "Orders API" as api',
      'database "Orders DB" as db',
      'api --> db',
      '@enduml'
    ]);
    expect(lines.filter((l) => l.includes('-->'))).toHaveLength(1);
    expect(lines[lines.length - 1]).toMatch(FINGERPRINT_LINE);
    expect(lines[lines.length - 1]).toBe(`' fingerprint: ${fingerprint(lines.slice(0, -1).join('\n'))}`);
  });

  it('changes the fingerprint when a label changes', () => {
    const before = structuralIrToPlantuml(twoNode()).split('\n').pop();
    const after = structuralIrToPlantuml(twoNode('Orders Store')).split('\n').pop();
    expect(after).toMatch(FINGERPRINT_LINE);
    expect(after).not.toBe(before);
  });

  it('does not depend on input order', () => {
    const ir = twoNode();
    const reversed: StructuralIR = { ...ir, nodes: [...ir.nodes].reverse() };
    expect(structuralIrToPlantuml(reversed)).toBe(structuralIrToPlantuml(ir));
  });

  it('packages zones and dots async edges', () => {
    const ir = structuralFromVersion(makeVersion('shop', threeTier(), null));
    expect(structuralIrToPlantuml(ir).split('\n').slice(0, -1)).toEqual([
      '@startuml',
      'top to bottom direction',
      'package "clients" as grp_clients {',
      '  component "Web App" as web',
      '}',
      'package "core" as grp_core {',
      '  component "Orders API" as api',
      '  component "Orders DB" as db',
      '}',
      'api ..> db',
      'web --> api',
      '@enduml'
    ]);
  });

  it('keeps colliding ids apart', () => {
    const ir: StructuralIR = {
      diagram_kind: 'component',
      layout: 'left-right',
      nodes: [
        { id: 'order-api', kind: 'service', label: 'Orders v2' },
        { id: 'order api', kind: 'service', label: 'Orders v1' }
      ],
      edges: [{ from: 'order api', to: 'order-api', type: 'sync', label: 'migrates to' }],
      groups: []
    };
    expect(structuralIrToPlantuml(ir).split('\n').slice(1, 5)).toEqual([
      'left to right direction',
      'component "Orders v1" as order_api',
      'component "Orders v2" as order_api_2',
      'order_api --> order_api_2 : migrates to'
    ]);
  });

  it('writes sequence diagrams with participants in order', () => {
    const ir: StructuralIR = {
      diagram_kind: 'sequence',
      layout: 'top-down',
      nodes: [
        { id: 'user', kind: 'actor', label: 'Shopper' },
        { id: 'api', kind: 'service', label: 'Orders API' }
      ],
      edges: [
        { from: 'api', to: 'user', type: 'async', label: 'receipt', order: 2 },
        { from: 'user', to: 'api', type: 'sync', label: 'checkout', order: 1 }
      ],
      groups: []
    };
    expect(structuralIrToPlantuml(ir).split('\n').slice(0, -1)).toEqual([
      '@startuml',
      'participant "Orders API" as api',
      'actor "Shopper" as user',
      'user -> api : checkout',
      'api ->> user : receipt',
      '@enduml'
    ]);
  });
});

describe('structuralIrToMermaid', () => {
  it('renders a flowchart with subgraphs and labelled edges', () => {
    const ir: StructuralIR = {
      ...twoNode(),
      layout: 'left-right',
      edges: [{ from: 'api', to: 'db', type: 'async', label: 'writes' }],
      groups: [{ id: 'core', label: 'Core', members: ['db', 'api'] }]
    };
    const lines = structuralIrToMermaid(ir).split('\n');
    expect(lines.slice(0, -1)).toEqual([
      'flowchart LR',
      '  api["Orders API"]',
      '  db[("Orders DB")]',
      '  subgraph grp_core["Core"]',
      '    api',
      '    db',
      '  end',
      '  api -. writes .-> db'
    ]);
    expect(lines[lines.length - 1]).toMatch(/^%% fingerprint: [0-9a-f]{16}$/);
  });

  it('uses the plain arrow for unlabelled sync edges', () => {
    expect(structuralIrToMermaid(twoNode()).split('\n')).toContain('  api --> db');
  });

  it('writes sequence diagrams', () => {
    const ir: StructuralIR = {
      diagram_kind: 'sequence',
      layout: 'top-down',
      nodes: [
        { id: 'user', kind: 'person', label: 'Shopper' },
        { id: 'api', kind: 'service', label: 'Orders API' }
      ],
      edges: [{ from: 'user', to: 'api', type: 'sync', label: 'GET /cart', order: 1 }],
      groups: []
    };
    expect(structuralIrToMermaid(ir).split('\n').slice(0, -1)).toEqual([
      'sequenceDiagram',
      '  participant api as Orders API',
      '  actor user as Shopper',
      '  user->>api: GET /cart'
    ]);
  });
});

describe('structuralIrToStructurizrJson', () => {
  it('emits a sorted workspace with a fingerprint', () => {
    const text = structuralIrToStructurizrJson(twoNode());
    const doc: unknown = JSON.parse(text);
    expect(doc).toEqual({
      fingerprint: expect.stringMatching(/^[0-9a-f]{16}$/),
      workspace: {
        name: 'Diagram',
        model: {
          people: [],
          softwareSystems: [
            { id: 'api', name: 'Orders API', tags: 'Element,Container' },
            { id: 'db', name: 'Orders DB', tags: 'Element,Database' }
          ],
          relationships: [
            {
              id: 'rel_1',
              sourceId: 'api',
              destinationId: 'db',
              description: 'sync',
              interactionStyle: 'Synchronous',
              tags: 'Relationship,sync'
            }
          ]
        },
        views: { systemContextViews: [{ key: 'SystemContext', automaticLayout: { rankDirection: 'TopBottom' } }] }
      }
    });
    expect(text.indexOf('"fingerprint"')).toBeLessThan(text.indexOf('"workspace"'));
    expect(structuralIrToStructurizrJson(twoNode())).toBe(text);
  });

  it('puts actors under people', () => {
    const ir: StructuralIR = { ...twoNode(), nodes: [{ id: 'u', kind: 'actor', label: 'User', group: 'clients' }], edges: [] };
    const doc: unknown = JSON.parse(structuralIrToStructurizrJson(ir));
    expect(doc).toMatchObject({
      workspace: { model: { people: [{ id: 'u', name: 'User', tags: 'Element,Person', group: 'clients' }], softwareSystems: [] } }
    });
  });
});

describe('normalizeStructural', () => {
  it('sorts edges by endpoint, type and label', () => {
    const ir: StructuralIR = {
      diagram_kind: 'component',
      layout: 'top-down',
      nodes: [],
      edges: [
        { from: 'b', to: 'a', type: 'sync' },
        { from: 'a', to: 'b', type: 'sync', label: 'z' },
        { from: 'a', to: 'b', type: 'sync', label: 'a' },
        { from: 'a', to: 'b', type: 'async' }
      ],
      groups: []
    };
    expect(normalizeStructural(ir).edges.map((e) => `${e.from}${e.to}${e.type}${e.label ?? ''}`)).toEqual([
      'abasync',
      'absynca',
      'absyncz',
      'basync'
    ]);
  });
});

describe('canonicalJson', () => {
  it('sorts keys and drops undefined members', () => {
    expect(canonicalJson({ b: 1, a: [true, null, 'x'], c: undefined })).toBe('{"a":[true,null,"x"],"b":1}');
  });
});
