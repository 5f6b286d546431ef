import { describe, it, expect } from 'vitest';
import { FeedbackService } from '@/lib/patch/service';
import { MemoryHistoryStore, listIrHistory } from '@/lib/ir/history';
import { makeVersion } from '@/lib/ir/versioning';
import { NotFoundError, StructuralIntegrityError, VersionConflictError } from '@/lib/errors';
import { threeTier } from '../fixtures/ir';

async function seeded() {
  const store = new MemoryHistoryStore();
  const service = new FeedbackService(store);
  await service.create(makeVersion('shop', threeTier(), null));
  return { store, service };
}

describe('MemoryHistoryStore', () => {
  it('refuses appends whose parent is not the head', async () => {
    const store = new MemoryHistoryStore();
    const v1 = makeVersion('shop', threeTier(), null);
    await store.append({ version: v1 });
    await expect(store.append({ version: v1 })).rejects.toBeInstanceOf(VersionConflictError);
    const orphanRoot = makeVersion('other', threeTier('other'), 1);
    await expect(store.append({ version: orphanRoot })).rejects.toBeInstanceOf(VersionConflictError);
  });
});

describe('FeedbackService', () => {
  it('appends a version with its audit record', async () => {
    const { store, service } = await seeded();
    const result = await service.apply({ diagram_id: 'shop', block_id: 'web', action: 'edit_text', payload: { text: 'Storefront' } });
    expect(result.version.ir_version).toBe(2);
    const head = await store.head('shop');
    expect(head?.audit?.parent_version).toBe(1);
    expect(head?.audit?.mutation_plan).toEqual([{ op: 'edit_text', block_id: 'web', before: 'Web App', after: 'Storefront' }]);
    expect((await service.current('shop')).ir.diagram.blocks[0]?.text).toBe('Storefront');
  });

  it('leaves history untouched when a patch is rejected', async () => {
    const { store, service } = await seeded();
    const before = (await listIrHistory(store, 'shop')).length;
    await expect(
      service.apply({ diagram_id: 'shop', block_id: 'db', action: 'remove_block', payload: { cascade: false } })
    ).rejects.toBeInstanceOf(StructuralIntegrityError);
    expect((await service.history('shop')).length).toBe(before);
  });

  it('serializes concurrent patches against one diagram', async () => {
    const { service } = await seeded();
    const results = await Promise.all([
      service.apply({ diagram_id: 'shop', block_id: 'web', action: 'hide' }),
      service.apply({ diagram_id: 'shop', block_id: 'api', action: 'hide' }),
      service.apply({ diagram_id: 'shop', block_id: 'db', action: 'hide' })
    ]);
    expect(results.map((r) => r.version.ir_version)).toEqual([2, 3, 4]);
    const history = await service.history('shop');
    expect(history.map((v) => v.parent_version)).toEqual([null, 1, 2, 3]);
    expect(history[3]?.ir.diagram.blocks.every((b) => b.hidden === true)).toBe(true);
  });

  it('keeps serving a diagram after a rejected patch', async () => {
    const { service } = await seeded();
    const rejected = service.apply({ diagram_id: 'shop', block_id: 'ghost', action: 'hide' });
    const accepted = service.apply({ diagram_id: 'shop', block_id: 'api', action: 'hide' });
    await expect(rejected).rejects.toBeInstanceOf(NotFoundError);
    expect((await accepted).version.ir_version).toBe(2);
  });

  it('reports unknown diagrams', async () => {
    const { service } = await seeded();
    await expect(service.current('missing')).rejects.toThrow("Unknown diagram 'missing'");
  });
});
