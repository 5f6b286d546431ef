import { ENGINE_DEFAULTS, type InvariancePolicy } from '@/config/engine';
import { SemanticDriftError } from '@/lib/errors';
import type { StructuralGraph } from '@/lib/svg/graph';
import { checkInvariance, type InvarianceResult } from '@/lib/svg/invariance';
import { attr, element, fromDraft, localName, parseSvgTree, serializeTree, toDraft, type DraftElement } from '@/lib/svg/tree';

export interface StyleRule {
  selector: string;
  declarations: Record<string, string>;
}

export interface AnimationStep {
  selector: string;
  element_id: string;
  role: 'node' | 'edge';
  /** Seconds. */
  delay: number;
}

export interface AnimationPlan {
  steps: AnimationStep[];
}

const SIMPLE_SELECTOR = /^[#.][A-Za-z_][\w-]*$/;

export function renderRules(rules: readonly StyleRule[]): string {
  return rules
    .map((rule) => {
      const body = Object.entries(rule.declarations)
        .map(([prop, value]) => `${prop}: ${value};`)
        .join(' ');
      return `${rule.selector} { ${body} }`;
    })
    .join('\n');
}

function findStyle(draft: DraftElement): DraftElement | undefined {
  for (const part of draft.content) {
    if (typeof part === 'string') continue;
    if (localName(part.name) === 'style') return part;
    const nested = findStyle(part);
    if (nested) return nested;
  }
  return undefined;
}

/** Append CSS to the first `<style>` element, creating one as the root's first child if absent. */
function appendCss(svgText: string, css: string): string {
  const draft = toDraft(parseSvgTree(svgText));
  const existing = findStyle(draft);
  if (existing) {
    existing.content.push(`\n${css}\n`);
  } else {
    draft.content.unshift(element('style', {}, [`\n${css}\n`]));
  }
  return serializeTree(fromDraft(draft));
}

export function injectStyles(svgText: string, rules: readonly StyleRule[]): string {
  return appendCss(svgText, renderRules(rules));
}

/** One step per node, then one per edge, in document order, staggered by `stagger` seconds. */
export function planAnimation(graph: StructuralGraph, stagger = 0.3): AnimationPlan {
  const targets: Array<{ id: string; role: 'node' | 'edge' }> = [
    ...graph.nodes.filter((n) => n.element_type === 'node').map((n) => ({ id: n.id, role: 'node' as const })),
    ...graph.edges.map((e) => ({ id: e.id, role: 'edge' as const }))
  ];
  return {
    steps: targets.map((t, idx) => ({
      selector: `#${t.id}`,
      element_id: t.id,
      role: t.role,
      delay: Math.round(idx * stagger * 100) / 100
    }))
  };
}

const ANIMATION_PRELUDE = [
  'svg * { transform-box: fill-box; transform-origin: center; }',
  '@keyframes animNodePulse { 0% { opacity: 0.4; } 50% { opacity: 1; } 100% { opacity: 0.4; } }',
  '@keyframes animEdgeFlow { 0% { stroke-dashoffset: 30; } 100% { stroke-dashoffset: 0; } }'
];

export function buildAnimationCss(plan: AnimationPlan): string {
  const lines = [...ANIMATION_PRELUDE];
  for (const step of plan.steps) {
    const delay = step.delay.toFixed(2);
    if (step.role === 'node') {
      lines.push(`${step.selector} { animation: animNodePulse 1.5s ease-in-out ${delay}s infinite; }`);
    } else {
      // dash properties do not inherit, so target the primitives
      const s = step.selector;
      lines.push(
        `${s} path, ${s} line, ${s} polyline { stroke-dasharray: 10 5; animation: animEdgeFlow 1s linear ${delay}s infinite; }`
      );
    }
  }
  return lines.join('\n');
}

/** Steps whose selector is malformed or names no element are dropped with a warning. */
export function injectAnimation(svgText: string, plan: AnimationPlan): string {
  const tree = parseSvgTree(svgText);
  const ids = new Set<string>();
  for (const node of tree.nodes) {
    const id = attr(tree, node.index, 'id');
    if (id) ids.add(id);
  }
  const rejected: string[] = [];
  const steps = plan.steps.filter((step) => {
    const ok = SIMPLE_SELECTOR.test(step.selector) && (!step.selector.startsWith('#') || ids.has(step.selector.slice(1)));
    if (!ok) rejected.push(step.selector);
    return ok;
  });
  if (rejected.length) console.warn('[ANIMATION_SELECTOR]', { rejected });
  return appendCss(svgText, buildAnimationCss({ steps }));
}

export type SvgTransform = (svgText: string) => string;

export interface GuardOptions {
  policy?: InvariancePolicy;
  strict?: boolean;
}

export interface GuardedTransform {
  svg: string;
  check: InvarianceResult;
}

/**
 * Run a cosmetic transform and check its output against the input graph.
 * `fail-closed` throws {@link SemanticDriftError} on any error-level violation;
 * `log-and-continue` logs and hands the output back.
 */
export function guardTransform(svgText: string, transform: SvgTransform, options: GuardOptions = {}): GuardedTransform {
  const policy = options.policy ?? ENGINE_DEFAULTS.invariance.policy;
  const strict = options.strict ?? ENGINE_DEFAULTS.invariance.strict;
  const output = transform(svgText);
  const check = checkInvariance(svgText, output, { strict });
  if (!check.is_valid) {
    console.warn('[INVARIANCE_VIOLATION]', {
      policy,
      summary: check.summary,
      errors: check.violations.filter((v) => v.severity === 'error').map((v) => `${v.violation_type}:${v.element_id}`)
    });
    if (policy === 'fail-closed') throw new SemanticDriftError(check.summary);
  }
  return { svg: output, check };
}
