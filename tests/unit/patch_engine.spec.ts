import { describe, it, expect } from 'vitest';
import { applyFeedback, findOrphans } from '@/lib/patch/engine';
import { parseFeedback } from '@/lib/patch/feedback';
import { makeVersion } from '@/lib/ir/versioning';
import { NotFoundError, StructuralIntegrityError, UnsupportedActionError, ValidationError } from '@/lib/errors';
import { threeTier } from '../fixtures/ir';

const v1 = () => makeVersion('shop', threeTier(), null);

describe('parseFeedback', () => {
  it('rejects unknown verbs before anything else', () => {
    expect(() => parseFeedback({ diagram_id: 'shop', action: 'explode' })).toThrow(UnsupportedActionError);
  });

  it('requires block_id for block-scoped verbs', () => {
    expect(() => parseFeedback({ diagram_id: 'shop', action: 'edit_text', payload: { text: 'x' } })).toThrow(
      "block_id is required for 'edit_text'"
    );
  });

  it('rejects payloads of the wrong shape', () => {
    expect(() => parseFeedback({ diagram_id: 'shop', block_id: 'api', action: 'edit_text', payload: { txt: 'x' } })).toThrow(
      ValidationError
    );
  });

  it('fills payload defaults', () => {
    const parsed = parseFeedback({ diagram_id: 'shop', block_id: 'api', action: 'remove_block' });
    expect(parsed).toEqual({ diagram_id: 'shop', block_id: 'api', action: 'remove_block', payload: { cascade: true } });
  });
});

describe('applyFeedback', () => {
  it('edits text, bumps the block version and mints the next IR version', () => {
    const current = v1();
    const result = applyFeedback(
      { diagram_id: 'shop', block_id: 'api', action: 'edit_text', payload: { text: 'Checkout API' } },
      current
    );
    const api = result.version.ir.diagram.blocks.find((b) => b.id === 'api');
    expect(api?.text).toBe('Checkout API');
    expect(api?.version).toBe(2);
    expect(result.version.ir_version).toBe(2);
    expect(result.version.parent_version).toBe(1);
    expect(result.log).toEqual({ op: 'edit_text', block_id: 'api', before: 'Orders API', after: 'Checkout API' });
    expect(current.ir.diagram.blocks[1]?.text).toBe('Orders API');
    expect(console.info).toHaveBeenCalledWith('[IR_VERSION]', {
      diagram_id: 'shop',
      ir_version: 2,
      parent_version: 1,
      action: 'edit_text',
      diff: 'blocks=3->3; relations=2->2'
    });
  });

  it('merges partial bboxes and styles', () => {
    const moved = applyFeedback(
      { diagram_id: 'shop', block_id: 'web', action: 'reposition', payload: { bbox: { x: 30 } } },
      v1()
    );
    expect(moved.version.ir.diagram.blocks[0]?.bbox).toEqual({ x: 30, y: 0, w: 140, h: 48 });
    const styled = applyFeedback(
      { diagram_id: 'shop', block_id: 'web', action: 'style', payload: { style: { fill: '#FDE68A' } } },
      moved.version
    );
    expect(styled.version.ir.diagram.blocks[0]?.style).toEqual({ fill: '#FDE68A' });
    expect(styled.version.ir.diagram.blocks[0]?.version).toBe(3);
    expect(styled.version.ir_version).toBe(3);
  });

  it('hides and shows a block', () => {
    const hidden = applyFeedback({ diagram_id: 'shop', block_id: 'db', action: 'hide' }, v1());
    expect(hidden.version.ir.diagram.blocks[2]?.hidden).toBe(true);
    expect(hidden.log).toEqual({ op: 'hide', block_id: 'db', before: { hidden: false }, after: { hidden: true } });
    const shown = applyFeedback({ diagram_id: 'shop', block_id: 'db', action: 'show' }, hidden.version);
    expect(shown.version.ir.diagram.blocks[2]?.hidden).toBeUndefined();
  });

  it('annotates without dropping existing keys', () => {
    const first = applyFeedback(
      { diagram_id: 'shop', block_id: 'api', action: 'annotate', payload: { annotations: { owner: 'team-a' } } },
      v1()
    );
    const second = applyFeedback(
      { diagram_id: 'shop', block_id: 'api', action: 'annotate', payload: { annotations: { tier: 1 } } },
      first.version
    );
    expect(second.version.ir.diagram.blocks[1]?.annotations).toEqual({ owner: 'team-a', tier: 1 });
  });

  it('adds blocks with generated ids and refuses duplicates', () => {
    const added = applyFeedback({ diagram_id: 'shop', action: 'add_block', payload: { text: 'Cache' } }, v1());
    const block = added.version.ir.diagram.blocks[3];
    expect(block).toEqual({
      id: 'block-1',
      type: 'component',
      text: 'Cache',
      bbox: { x: 0, y: 0, w: 140, h: 48 },
      style: {},
      annotations: {},
      version: 1
    });
    expect(() => applyFeedback({ diagram_id: 'shop', action: 'add_block', payload: { id: 'api' } }, v1())).toThrow(
      "Block 'api' already exists"
    );
  });

  it('removes exactly the incident edges of a removed block', () => {
    const current = v1();
    const api = applyFeedback({ diagram_id: 'shop', block_id: 'api', action: 'remove_block' }, current);
    expect(api.version.ir.diagram.edges).toHaveLength(current.ir.diagram.edges.length - 2);
    expect(api.log.before).toEqual({
      block: {
        id: 'api',
        type: 'component',
        text: 'Orders API',
        bbox: { x: 200, y: 0, w: 140, h: 48 },
        style: {},
        annotations: {},
        version: 1,
        zone: 'core'
      },
      removed_edges: ['web__api', 'api__db']
    });
    const db = applyFeedback({ diagram_id: 'shop', block_id: 'db', action: 'remove_block' }, current);
    expect(db.version.ir.diagram.edges.map((e) => e.edge_id)).toEqual(['web__api']);
    expect(db.diff.text).toBe('blocks=3->2; relations=2->1');
  });

  it('rejects removals that would orphan edges', () => {
    const current = v1();
    try {
      applyFeedback({ diagram_id: 'shop', block_id: 'api', action: 'remove_block', payload: { cascade: false } }, current);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(StructuralIntegrityError);
      if (err instanceof StructuralIntegrityError) {
        expect(err.orphans).toEqual([
          { edge_id: 'web__api', missing: ['api'] },
          { edge_id: 'api__db', missing: ['api'] }
        ]);
        expect(err.message).toBe('Patch would orphan 2 edge(s): web__api, api__db');
      }
    }
    expect(console.warn).toHaveBeenCalledWith(
      '[PATCH_REJECTED]',
      expect.objectContaining({ diagram_id: 'shop', action: 'remove_block' })
    );
    expect(current.ir.diagram.blocks).toHaveLength(3);
  });

  it('raises NotFoundError for unknown blocks and ValidationError for a foreign diagram', () => {
    expect(() => applyFeedback({ diagram_id: 'shop', block_id: 'nope', action: 'hide' }, v1())).toThrow(NotFoundError);
    expect(() => applyFeedback({ diagram_id: 'other', block_id: 'api', action: 'hide' }, v1())).toThrow(ValidationError);
  });
});

describe('findOrphans', () => {
  it('lists each missing endpoint once', () => {
    const doc = threeTier();
    doc.diagram.blocks = [];
    expect(findOrphans(doc)).toEqual([
      { edge_id: 'web__api', missing: ['web', 'api'] },
      { edge_id: 'api__db', missing: ['api', 'db'] }
    ]);
  });
});
