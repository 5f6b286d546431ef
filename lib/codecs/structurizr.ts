import { IdAllocator } from '@/lib/ir/canonicalize';
import { canonicalJson, fingerprint, type HashInput } from '@/lib/codecs/fingerprint';
import { labelOr, sanitizeLabelText } from '@/lib/codecs/labels';
import { isAsyncEdge, nodeTypeOf } from '@/lib/codecs/kinds';
import { isLeftRight, normalizeStructural, type StructuralIR } from '@/lib/codecs/structural';
import type { NodeType } from '@/lib/enrich/tables';

const TAG_BY_TYPE: Record<NodeType, string> = {
  actor: 'Person',
  container: 'Container',
  component: 'Component',
  data_store: 'Database',
  external: 'External',
  system: 'Software System'
};

function sortKeys(value: HashInput): HashInput {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value && typeof value === 'object') {
    const out: { [key: string]: HashInput } = {};
    for (const key of Object.keys(value).sort()) {
      const member = value[key];
      if (member !== undefined) out[key] = sortKeys(member);
    }
    return out;
  }
  return value;
}

/** Structurizr-style workspace document. Keys are sorted; elements follow the normalized node order. */
export function structurizrWorkspace(input: StructuralIR): HashInput {
  const ir = normalizeStructural(input);
  const ids = new IdAllocator('structurizr');
  const people: HashInput[] = [];
  const softwareSystems: HashInput[] = [];
  const groupOf = new Map<string, string>();
  for (const group of ir.groups) {
    for (const member of group.members) {
      if (!groupOf.has(member)) groupOf.set(member, labelOr(group.label, group.id));
    }
  }

  for (const node of ir.nodes) {
    const type = nodeTypeOf(node.kind);
    const element: HashInput = {
      id: ids.get(node.id),
      name: labelOr(node.label, node.id),
      tags: `Element,${TAG_BY_TYPE[type]}`,
      group: groupOf.get(node.id) ?? node.group
    };
    if (type === 'actor') people.push(element);
    else softwareSystems.push(element);
  }

  const relationships: HashInput[] = ir.edges.map((edge, idx) => ({
    id: `rel_${idx + 1}`,
    sourceId: ids.get(edge.from),
    destinationId: ids.get(edge.to),
    description: sanitizeLabelText(edge.label ?? '') || edge.type,
    interactionStyle: isAsyncEdge(edge.type) ? 'Asynchronous' : 'Synchronous',
    tags: `Relationship,${edge.type}`
  }));

  return {
    name: labelOr(ir.title, 'Diagram'),
    model: { people, softwareSystems, relationships },
    views: {
      systemContextViews: [
        {
          key: 'SystemContext',
          automaticLayout: { rankDirection: isLeftRight(ir.layout) ? 'LeftRight' : 'TopBottom' }
        }
      ]
    }
  };
}

/** Pretty JSON with sorted keys; `fingerprint` hashes the canonical workspace. */
export function structuralIrToStructurizrJson(input: StructuralIR): string {
  const workspace = structurizrWorkspace(input);
  const document = sortKeys({ fingerprint: fingerprint(canonicalJson(workspace)), workspace });
  return JSON.stringify(document, null, 2);
}
