import { describe, it, expect } from 'vitest';
import { buildAnimationCss, injectAnimation, injectStyles, planAnimation, renderRules } from '@/lib/svg/transforms';
import { renderVersionSvg } from '@/lib/ir/adapter';
import { makeVersion } from '@/lib/ir/versioning';
import { analyze } from '@/lib/svg/analyzer';
import { checkInvariance } from '@/lib/svg/invariance';
import { threeTier } from '../fixtures/ir';
import { NS } from '../fixtures/svg';

const svg = renderVersionSvg(makeVersion('shop', threeTier(), null));

describe('renderRules', () => {
  it('writes one rule per line', () => {
    expect(
      renderRules([
        { selector: '#api', declarations: { fill: '#FDE68A', stroke: '#0F172A' } },
        { selector: '.muted', declarations: { opacity: '0.5' } }
      ])
    ).toBe('#api { fill: #FDE68A; stroke: #0F172A; }\n.muted { opacity: 0.5; }');
  });
});

describe('injectStyles', () => {
  it('appends to an existing style element', () => {
    const out = injectStyles(`<svg xmlns="${NS}"><style>.a { fill: red; }</style></svg>`, [
      { selector: '.b', declarations: { fill: 'blue' } }
    ]);
    expect(out).toBe(`<svg xmlns="${NS}"><style>.a { fill: red; }\n.b { fill: blue; }\n</style></svg>`);
  });

  it('creates a style element as the first child', () => {
    const out = injectStyles(`<svg xmlns="${NS}"><rect id="r" width="1" height="1"/></svg>`, [
      { selector: '#r', declarations: { fill: 'blue' } }
    ]);
    expect(out).toBe(`<svg xmlns="${NS}"><style>\n#r { fill: blue; }\n</style><rect id="r" width="1" height="1"/></svg>`);
  });
});

describe('planAnimation', () => {
  it('staggers nodes first, then edges', () => {
    const plan = planAnimation(analyze(svg));
    expect(plan.steps.map((s) => [s.selector, s.role, s.delay])).toEqual([
      ['#web', 'node', 0],
      ['#api', 'node', 0.3],
      ['#db', 'node', 0.6],
      ['#web__api', 'edge', 0.9],
      ['#api__db', 'edge', 1.2]
    ]);
  });

  it('targets edge primitives for dash animation', () => {
    const css = buildAnimationCss({ steps: [{ selector: '#a__b', element_id: 'a__b', role: 'edge', delay: 0.5 }] });
    expect(css.split('\n').pop()).toBe(
      '#a__b path, #a__b line, #a__b polyline { stroke-dasharray: 10 5; animation: animEdgeFlow 1s linear 0.50s infinite; }'
    );
  });
});

describe('injectAnimation', () => {
  it('drops steps for elements that do not exist and keeps the graph intact', () => {
    const plan = planAnimation(analyze(svg));
    plan.steps.push({ selector: '#ghost', element_id: 'ghost', role: 'node', delay: 2 });
    plan.steps.push({ selector: 'g > rect', element_id: 'x', role: 'node', delay: 2 });
    const out = injectAnimation(svg, plan);
    expect(out).toContain('#api { animation: animNodePulse 1.5s ease-in-out 0.30s infinite; }');
    expect(out).not.toContain('#ghost');
    expect(console.warn).toHaveBeenCalledWith('[ANIMATION_SELECTOR]', { rejected: ['#ghost', 'g > rect'] });
    expect(checkInvariance(svg, out).is_valid).toBe(true);
  });
});
