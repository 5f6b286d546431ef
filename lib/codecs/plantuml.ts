import { IdAllocator } from '@/lib/ir/canonicalize';
import { fingerprint } from '@/lib/codecs/fingerprint';
import { labelOr, sanitizeLabelText } from '@/lib/codecs/labels';
import { isAsyncEdge, nodeTypeOf, plantumlKeyword } from '@/lib/codecs/kinds';
import { isLeftRight, isSequence, normalizeStructural, type StructuralIR, type StructuralIRNode } from '@/lib/codecs/structural';

export const PLANTUML_FINGERPRINT_PREFIX = "' fingerprint: ";

function renderNode(node: StructuralIRNode, ids: IdAllocator, indent = ''): string {
  return `${indent}${plantumlKeyword(node.kind)} "${labelOr(node.label, node.id)}" as ${ids.get(node.id)}`;
}

function edgeLabel(label: string | undefined): string {
  const cleaned = sanitizeLabelText(label ?? '', { max: 60 });
  return cleaned ? ` : ${cleaned}` : '';
}

function componentBody(ir: StructuralIR, ids: IdAllocator, lines: string[]) {
  lines.push(isLeftRight(ir.layout) ? 'left to right direction' : 'top to bottom direction');
  if (ir.title) lines.push(`title ${labelOr(ir.title, 'Diagram')}`);

  const groupIds = new IdAllocator('plantuml-group');
  const grouped = new Set<string>();
  const byId = new Map(ir.nodes.map((n) => [n.id, n]));
  for (const group of ir.groups) {
    const members = group.members.flatMap((id) => {
      const node = byId.get(id);
      return node && !grouped.has(id) ? [node] : [];
    });
    if (!members.length) continue;
    lines.push(`package "${labelOr(group.label, group.id)}" as ${groupIds.get(`grp_${group.id}`)} {`);
    for (const node of members) {
      grouped.add(node.id);
      lines.push(renderNode(node, ids, '  '));
    }
    lines.push('}');
  }
  for (const node of ir.nodes) {
    if (!grouped.has(node.id)) lines.push(renderNode(node, ids));
  }
  for (const edge of ir.edges) {
    const arrow = isAsyncEdge(edge.type) ? '..>' : '-->';
    lines.push(`${ids.get(edge.from)} ${arrow} ${ids.get(edge.to)}${edgeLabel(edge.label)}`);
  }
}

function sequenceBody(ir: StructuralIR, ids: IdAllocator, lines: string[]) {
  if (ir.title) lines.push(`title ${labelOr(ir.title, 'Diagram')}`);
  for (const node of ir.nodes) {
    const keyword = nodeTypeOf(node.kind) === 'actor' ? 'actor' : 'participant';
    lines.push(`${keyword} "${labelOr(node.label, node.id)}" as ${ids.get(node.id)}`);
  }
  for (const edge of ir.edges) {
    const arrow = isAsyncEdge(edge.type) ? '->>' : '->';
    lines.push(`${ids.get(edge.from)} ${arrow} ${ids.get(edge.to)}${edgeLabel(edge.label)}`);
  }
}

/**
 * PlantUML source for a structural IR. Output is a pure function of the
 * normalized input; the last line is a fingerprint of everything above it.
 */
export function structuralIrToPlantuml(input: StructuralIR): string {
  const ir = normalizeStructural(input);
  const ids = new IdAllocator('plantuml');
  for (const node of ir.nodes) ids.get(node.id);

  const lines = ['@startuml'];
  if (isSequence(ir)) sequenceBody(ir, ids, lines);
  else componentBody(ir, ids, lines);
  lines.push('@enduml');

  const body = lines.join('\n');
  return `${body}\n${PLANTUML_FINGERPRINT_PREFIX}${fingerprint(body)}`;
}
