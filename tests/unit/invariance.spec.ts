import { describe, it, expect } from 'vitest';
import { checkInvariance, formatViolation, reportViolations } from '@/lib/svg/invariance';
import { guardTransform, injectStyles } from '@/lib/svg/transforms';
import { renderVersionSvg } from '@/lib/ir/adapter';
import { makeVersion } from '@/lib/ir/versioning';
import { applyFeedback } from '@/lib/patch/engine';
import { SemanticDriftError } from '@/lib/errors';
import { threeTier } from '../fixtures/ir';

const v1 = makeVersion('shop', threeTier(), null);
const baseSvg = renderVersionSvg(v1);

function patched(input: Record<string, unknown>): string {
  return renderVersionSvg(applyFeedback({ diagram_id: 'shop', ...input }, v1).version);
}

const duplicateApiId = (svg: string) => svg.replace('</svg>', '<rect id="api" width="1" height="1"/></svg>');

describe('checkInvariance', () => {
  it('passes identical documents', () => {
    const result = checkInvariance(baseSvg, baseSvg);
    expect(result.is_valid).toBe(true);
    expect(result.violations).toEqual([]);
    expect(result.similarity).toBe(1);
    expect(result.summary).toBe('Semantic invariance preserved: no violations detected');
  });

  it('flags a changed label', () => {
    const result = checkInvariance(baseSvg, patched({ block_id: 'api', action: 'edit_text', payload: { text: 'Checkout API' } }));
    expect(result.violations).toEqual([
      {
        violation_type: 'label_changed',
        element_id: 'api',
        description: "Label changed from 'Orders API' to 'Checkout API'",
        severity: 'error'
      }
    ]);
    expect(result.summary).toBe('Semantic invariance violated: 1 errors, 0 warnings');
    expect(result.violations.map(formatViolation)).toEqual([
      "[ERROR] label_changed: Label changed from 'Orders API' to 'Checkout API'"
    ]);
  });

  it('reports a removed node and its edge by id and by endpoints', () => {
    const result = checkInvariance(baseSvg, patched({ block_id: 'db', action: 'remove_block' }));
    expect(result.violations.map((v) => [v.violation_type, v.element_id, v.severity])).toEqual([
      ['node_missing', 'db', 'error'],
      ['edge_missing', 'api__db', 'error'],
      ['edge_missing', 'api->db', 'error'],
      ['structure_changed', 'root', 'warning']
    ]);
    expect(result.violations[0]?.description).toBe("Node 'Orders DB' was removed");
    expect(result.violations[3]?.description).toBe('Overall structure changed significantly (similarity: 80.00%)');
    expect(result.summary).toBe('Semantic invariance violated: 3 errors, 1 warnings');
  });

  it('grades additions by strictness', () => {
    const post = patched({ action: 'add_block', payload: { id: 'cache', text: 'Cache' } });
    const lenient = checkInvariance(baseSvg, post, { strict: false });
    expect(lenient.violations.map((v) => [v.violation_type, v.severity])).toEqual([
      ['node_added', 'info'],
      ['structure_changed', 'warning']
    ]);
    expect(lenient.is_valid).toBe(true);
    expect(lenient.summary).toBe('Semantic invariance preserved with 2 warnings');
    expect(checkInvariance(baseSvg, post).violations[0]?.severity).toBe('warning');
  });

  it('flags ids that become ambiguous', () => {
    const result = checkInvariance(baseSvg, duplicateApiId(baseSvg));
    expect(result.violations.map((v) => [v.violation_type, v.element_id])).toEqual([['id_collision', 'api']]);
  });

  it('writes a readable report', () => {
    const result = checkInvariance(baseSvg, duplicateApiId(baseSvg));
    const lines = reportViolations(result).split('\n');
    expect(lines).toContain('Status: FAILED');
    expect(lines).toContain('Errors: 1');
    expect(lines).toContain('Nodes: 3 -> 3');
    expect(lines).toContain("[ERROR] id_collision: Element id 'api' is now used by more than one element");
  });
});

describe('guardTransform', () => {
  it('lets cosmetic styling through', () => {
    const { svg, check } = guardTransform(baseSvg, (s) => injectStyles(s, [{ selector: '#api', declarations: { opacity: '0.9' } }]), {
      policy: 'fail-closed'
    });
    expect(check.is_valid).toBe(true);
    expect(svg).toContain('#api { opacity: 0.9; }');
  });

  it('throws under fail-closed when the structure drifts', () => {
    expect(() => guardTransform(baseSvg, duplicateApiId, { policy: 'fail-closed' })).toThrow(SemanticDriftError);
    expect(console.warn).toHaveBeenCalledWith(
      '[INVARIANCE_VIOLATION]',
      expect.objectContaining({ policy: 'fail-closed', errors: ['id_collision:api'] })
    );
  });

  it('logs and returns the output under log-and-continue', () => {
    const { svg, check } = guardTransform(baseSvg, duplicateApiId, { policy: 'log-and-continue' });
    expect(check.is_valid).toBe(false);
    expect(svg).toBe(duplicateApiId(baseSvg));
  });
});
