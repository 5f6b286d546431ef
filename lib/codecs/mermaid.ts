import { IdAllocator } from '@/lib/ir/canonicalize';
import { fingerprint } from '@/lib/codecs/fingerprint';
import { labelOr, sanitizeLabelText } from '@/lib/codecs/labels';
import { isAsyncEdge, nodeTypeOf } from '@/lib/codecs/kinds';
import { isLeftRight, isSequence, normalizeStructural, type StructuralIR, type StructuralIRNode } from '@/lib/codecs/structural';

export const MERMAID_FINGERPRINT_PREFIX = '%% fingerprint: ';

const EDGE_LABEL_MAX = 30;

function renderNode(node: StructuralIRNode, ids: IdAllocator): string {
  const id = ids.get(node.id);
  const label = labelOr(node.label, node.id);
  switch (nodeTypeOf(node.kind)) {
    case 'data_store':
      return `${id}[("${label}")]`;
    case 'actor':
      return `${id}(("${label}"))`;
    case 'external':
      return `${id}{{"${label}"}}`;
    default:
      return `${id}["${label}"]`;
  }
}

function flowchartBody(ir: StructuralIR, ids: IdAllocator, lines: string[]) {
  lines[0] = `flowchart ${isLeftRight(ir.layout) ? 'LR' : 'TB'}`;
  for (const node of ir.nodes) lines.push(`  ${renderNode(node, ids)}`);

  const known = new Set(ir.nodes.map((n) => n.id));
  const groupIds = new IdAllocator('mermaid-group');
  for (const group of ir.groups) {
    const members = group.members.filter((id) => known.has(id));
    if (!members.length) continue;
    lines.push(`  subgraph ${groupIds.get(`grp_${group.id}`)}["${labelOr(group.label, group.id)}"]`);
    for (const id of members) lines.push(`    ${ids.get(id)}`);
    lines.push('  end');
  }

  for (const edge of ir.edges) {
    const from = ids.get(edge.from);
    const to = ids.get(edge.to);
    const label = sanitizeLabelText(edge.label ?? '', { max: EDGE_LABEL_MAX });
    const dotted = isAsyncEdge(edge.type);
    if (label) lines.push(dotted ? `  ${from} -. ${label} .-> ${to}` : `  ${from} -- ${label} --> ${to}`);
    else lines.push(dotted ? `  ${from} -.-> ${to}` : `  ${from} --> ${to}`);
  }
}

function sequenceBody(ir: StructuralIR, ids: IdAllocator, lines: string[]) {
  lines[0] = 'sequenceDiagram';
  for (const node of ir.nodes) {
    const keyword = nodeTypeOf(node.kind) === 'actor' ? 'actor' : 'participant';
    lines.push(`  ${keyword} ${ids.get(node.id)} as ${labelOr(node.label, node.id)}`);
  }
  for (const edge of ir.edges) {
    const arrow = isAsyncEdge(edge.type) ? '-)' : '->>';
    const label = sanitizeLabelText(edge.label ?? '', { max: EDGE_LABEL_MAX }) || edge.type;
    lines.push(`  ${ids.get(edge.from)}${arrow}${ids.get(edge.to)}: ${label}`);
  }
}

/** Mermaid flowchart (or sequence diagram) text with a trailing fingerprint comment. */
export function structuralIrToMermaid(input: StructuralIR): string {
  const ir = normalizeStructural(input);
  const ids = new IdAllocator('mermaid');
  for (const node of ir.nodes) ids.get(node.id);

  const lines: string[] = [''];
  if (isSequence(ir)) sequenceBody(ir, ids, lines);
  else flowchartBody(ir, ids, lines);

  const body = lines.join('\n');
  return `${body}\n${MERMAID_FINGERPRINT_PREFIX}${fingerprint(body)}`;
}
