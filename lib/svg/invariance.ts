import { ENGINE_DEFAULTS } from '@/config/engine';
import { analyze } from '@/lib/svg/analyzer';
import type { StructuralGraph } from '@/lib/svg/graph';

export type ViolationType =
  | 'node_missing'
  | 'node_added'
  | 'edge_missing'
  | 'edge_added'
  | 'group_missing'
  | 'group_added'
  | 'label_changed'
  | 'structure_changed'
  | 'id_collision';

export type ViolationSeverity = 'error' | 'warning' | 'info';

export interface InvarianceViolation {
  violation_type: ViolationType;
  element_id: string;
  description: string;
  severity: ViolationSeverity;
}

export interface InvarianceResult {
  is_valid: boolean;
  violations: InvarianceViolation[];
  summary: string;
  similarity: number;
  pre_structure: StructuralGraph;
  post_structure: StructuralGraph;
}

export interface InvarianceOptions {
  /** Additions are warnings when strict, info otherwise. */
  strict?: boolean;
  similarityWarning?: number;
  similarityError?: number;
}

const sortedMinus = (a: ReadonlySet<string>, b: ReadonlySet<string>) => [...a].filter((x) => !b.has(x)).sort();

function endpointPairs(graph: StructuralGraph): Set<string> {
  const pairs = new Set<string>();
  for (const edge of graph.edges) {
    if (edge.source_id !== null && edge.target_id !== null) pairs.add(`${edge.source_id}->${edge.target_id}`);
  }
  return pairs;
}

export function similarity(pre: StructuralGraph, post: StructuralGraph): number {
  const nodeDiff = Math.abs(pre.nodes.length - post.nodes.length);
  const edgeDiff = Math.abs(pre.edges.length - post.edges.length);
  const total = Math.max(pre.nodes.length + pre.edges.length, 1);
  return 1 - (nodeDiff + edgeDiff) / (total * 2);
}

export function formatViolation(v: InvarianceViolation): string {
  return `[${v.severity.toUpperCase()}] ${v.violation_type}: ${v.description}`;
}

/** Compare graphs already extracted from SVG. Every id list is walked in sorted order. */
export function checkGraphs(pre: StructuralGraph, post: StructuralGraph, options: InvarianceOptions = {}): InvarianceResult {
  const strict = options.strict ?? true;
  const warnAt = options.similarityWarning ?? ENGINE_DEFAULTS.invariance.similarityWarning;
  const errorAt = options.similarityError ?? ENGINE_DEFAULTS.invariance.similarityError;
  const added: ViolationSeverity = strict ? 'warning' : 'info';
  const violations: InvarianceViolation[] = [];
  const push = (violation_type: ViolationType, element_id: string, description: string, severity: ViolationSeverity) =>
    violations.push({ violation_type, element_id, description, severity });

  const preNodes = new Map(pre.nodes.map((n) => [n.id, n]));
  const postNodes = new Map(post.nodes.map((n) => [n.id, n]));
  const preNodeIds = new Set(preNodes.keys());
  const postNodeIds = new Set(postNodes.keys());
  for (const id of sortedMinus(preNodeIds, postNodeIds)) {
    push('node_missing', id, `Node '${preNodes.get(id)?.label || id}' was removed`, 'error');
  }
  for (const id of sortedMinus(postNodeIds, preNodeIds)) {
    push('node_added', id, `Node '${postNodes.get(id)?.label || id}' was added`, added);
  }

  const preEdgeIds = new Set(pre.edges.map((e) => e.id));
  const postEdgeIds = new Set(post.edges.map((e) => e.id));
  for (const id of sortedMinus(preEdgeIds, postEdgeIds)) {
    push('edge_missing', id, `Edge '${id}' was removed`, 'error');
  }
  const prePairs = endpointPairs(pre);
  const postPairs = endpointPairs(post);
  for (const pair of sortedMinus(prePairs, postPairs)) {
    const [source, target] = pair.split('->');
    push('edge_missing', pair, `Edge from '${source}' to '${target}' was removed`, 'error');
  }
  for (const id of sortedMinus(postEdgeIds, preEdgeIds)) {
    push('edge_added', id, `Edge '${id}' was added`, added);
  }
  for (const pair of sortedMinus(postPairs, prePairs)) {
    const [source, target] = pair.split('->');
    push('edge_added', pair, `Edge from '${source}' to '${target}' was added`, added);
  }

  const preGroups = new Set(pre.groups.map((g) => g.id));
  const postGroups = new Set(post.groups.map((g) => g.id));
  for (const id of sortedMinus(preGroups, postGroups)) {
    push('group_missing', id, `Group '${id}' was removed`, 'error');
  }
  for (const id of sortedMinus(postGroups, preGroups)) {
    push('group_added', id, `Group '${id}' was added`, added);
  }

  for (const id of [...preNodeIds].filter((x) => postNodeIds.has(x)).sort()) {
    const before = preNodes.get(id)?.label;
    const after = postNodes.get(id)?.label;
    if (before !== after) {
      push('label_changed', id, `Label changed from '${before ?? ''}' to '${after ?? ''}'`, 'error');
    }
  }

  for (const id of sortedMinus(new Set(post.duplicate_ids), new Set(pre.duplicate_ids))) {
    push('id_collision', id, `Element id '${id}' is now used by more than one element`, 'error');
  }

  const score = similarity(pre, post);
  if (score < warnAt) {
    push(
      'structure_changed',
      'root',
      `Overall structure changed significantly (similarity: ${(score * 100).toFixed(2)}%)`,
      score < errorAt ? 'error' : 'warning'
    );
  }

  const errors = violations.filter((v) => v.severity === 'error').length;
  const isValid = errors === 0;
  let summary: string;
  if (isValid && !violations.length) summary = 'Semantic invariance preserved: no violations detected';
  else if (isValid) summary = `Semantic invariance preserved with ${violations.length} warnings`;
  else summary = `Semantic invariance violated: ${errors} errors, ${violations.length - errors} warnings`;

  return { is_valid: isValid, violations, summary, similarity: score, pre_structure: pre, post_structure: post };
}

/**
 * Check that `postSvg` carries the same semantic graph as `preSvg`.
 * Reports rather than throws; {@link guardTransform} decides what a failure means.
 */
export function checkInvariance(preSvg: string, postSvg: string, options: InvarianceOptions = {}): InvarianceResult {
  return checkGraphs(analyze(preSvg, 'pre'), analyze(postSvg, 'post'), options);
}

export function reportViolations(result: InvarianceResult): string {
  const rule = '='.repeat(60);
  const thin = '-'.repeat(40);
  const count = (severity: ViolationSeverity) => result.violations.filter((v) => v.severity === severity).length;
  const lines = [
    rule,
    'SEMANTIC INVARIANCE CHECK REPORT',
    rule,
    '',
    `Status: ${result.is_valid ? 'PASSED' : 'FAILED'}`,
    `Errors: ${count('error')}`,
    `Warnings: ${count('warning')}`,
    ''
  ];
  if (result.violations.length) {
    lines.push('VIOLATIONS:', thin, ...result.violations.map(formatViolation), '');
  }
  lines.push(
    'STRUCTURE COMPARISON:',
    thin,
    `Nodes: ${result.pre_structure.nodes.length} -> ${result.post_structure.nodes.length}`,
    `Edges: ${result.pre_structure.edges.length} -> ${result.post_structure.edges.length}`,
    `Groups: ${result.pre_structure.groups.length} -> ${result.post_structure.groups.length}`,
    '',
    result.summary,
    rule
  );
  return lines.join('\n');
}
