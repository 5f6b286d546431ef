import { NotFoundError, StructuralIntegrityError, ValidationError, type OrphanedEdge } from '@/lib/errors';
import type { PatchAudit } from '@/lib/ir/history';
import type { Block, IRDocument, IRVersion, JsonValue } from '@/lib/ir/schema';
import { cloneIR, diffSummary, makeVersion, type DiffSummary, type PatchLogEntry } from '@/lib/ir/versioning';
import { parseFeedback, type FeedbackRequest } from '@/lib/patch/feedback';

export interface PatchResult {
  version: IRVersion;
  log: PatchLogEntry;
  diff: DiffSummary;
  audit: PatchAudit;
}

const DEFAULT_BLOCK_BBOX = { x: 0, y: 0, w: 140, h: 48 };

function nextBlockId(blocks: readonly Block[]): string {
  const taken = new Set(blocks.map((b) => b.id));
  let n = 1;
  while (taken.has(`block-${n}`)) n += 1;
  return `block-${n}`;
}

function requireBlock(ir: IRDocument, blockId: string): Block {
  const block = ir.diagram.blocks.find((b) => b.id === blockId);
  if (!block) throw new NotFoundError(`Block '${blockId}' not found in diagram '${ir.diagram.id}'`);
  return block;
}

function snapshot<T extends JsonValue>(value: T): T {
  return cloneIR(value);
}

function blockSnapshot(block: Block): JsonValue {
  const out: { [key: string]: JsonValue } = {
    id: block.id,
    type: block.type,
    text: block.text,
    bbox: { ...block.bbox },
    style: { ...block.style },
    annotations: snapshot(block.annotations),
    version: block.version
  };
  if (block.hidden !== undefined) out.hidden = block.hidden;
  if (block.zone !== undefined) out.zone = block.zone;
  return out;
}

/** Applies one verb to a mutable copy and returns its log entry. */
function mutate(ir: IRDocument, feedback: FeedbackRequest): PatchLogEntry {
  switch (feedback.action) {
    case 'edit_text': {
      const block = requireBlock(ir, feedback.block_id);
      const before = block.text;
      block.text = feedback.payload.text;
      block.version += 1;
      return { op: feedback.action, block_id: block.id, before, after: block.text };
    }
    case 'reposition': {
      const block = requireBlock(ir, feedback.block_id);
      const before = snapshot(block.bbox);
      block.bbox = { ...block.bbox, ...feedback.payload.bbox };
      block.version += 1;
      return { op: feedback.action, block_id: block.id, before, after: snapshot(block.bbox) };
    }
    case 'style': {
      const block = requireBlock(ir, feedback.block_id);
      const before = snapshot(block.style);
      block.style = { ...block.style, ...feedback.payload.style };
      block.version += 1;
      return { op: feedback.action, block_id: block.id, before, after: snapshot(block.style) };
    }
    case 'annotate': {
      const block = requireBlock(ir, feedback.block_id);
      const before = snapshot(block.annotations);
      block.annotations = { ...block.annotations, ...feedback.payload.annotations };
      block.version += 1;
      return { op: feedback.action, block_id: block.id, before, after: snapshot(block.annotations) };
    }
    case 'hide':
    case 'show': {
      const block = requireBlock(ir, feedback.block_id);
      const before = block.hidden === true;
      if (feedback.action === 'hide') block.hidden = true;
      else delete block.hidden;
      block.version += 1;
      return { op: feedback.action, block_id: block.id, before: { hidden: before }, after: { hidden: block.hidden === true } };
    }
    case 'add_block': {
      const { payload } = feedback;
      const id = payload.id ?? nextBlockId(ir.diagram.blocks);
      if (ir.diagram.blocks.some((b) => b.id === id)) {
        throw new ValidationError(`Block '${id}' already exists`, [{ path: 'payload/id', message: 'duplicate block id' }]);
      }
      const block: Block = {
        id,
        type: payload.type ?? 'component',
        text: payload.text ?? id,
        bbox: { ...DEFAULT_BLOCK_BBOX, ...payload.bbox },
        style: payload.style ?? {},
        annotations: payload.annotations ?? {},
        version: 1,
        ...(payload.zone ? { zone: payload.zone } : {})
      };
      ir.diagram.blocks.push(block);
      return { op: feedback.action, block_id: id, after: blockSnapshot(block) };
    }
    case 'remove_block': {
      const block = requireBlock(ir, feedback.block_id);
      ir.diagram.blocks = ir.diagram.blocks.filter((b) => b.id !== block.id);
      const removed = feedback.payload.cascade
        ? ir.diagram.edges.filter((e) => e.from === block.id || e.to === block.id).map((e) => e.edge_id)
        : [];
      ir.diagram.edges = ir.diagram.edges.filter((e) => !removed.includes(e.edge_id));
      return {
        op: feedback.action,
        block_id: block.id,
        before: { block: blockSnapshot(block), removed_edges: removed }
      };
    }
  }
}

export function findOrphans(ir: IRDocument): OrphanedEdge[] {
  const ids = new Set(ir.diagram.blocks.map((b) => b.id));
  const orphans: OrphanedEdge[] = [];
  for (const edge of ir.diagram.edges) {
    const missing = [edge.from, edge.to].filter((id) => !ids.has(id));
    if (missing.length) orphans.push({ edge_id: edge.edge_id, missing: [...new Set(missing)] });
  }
  return orphans;
}

/**
 * Apply one feedback request to `current` and mint the next version.
 *
 * All-or-nothing: the mutation runs on a copy, and the copy is discarded if any
 * edge endpoint no longer resolves. `current` is never touched.
 */
export function applyFeedback(input: unknown, current: IRVersion): PatchResult {
  const feedback = parseFeedback(input);
  if (feedback.diagram_id !== current.diagram_id) {
    throw new ValidationError(
      `Feedback targets diagram '${feedback.diagram_id}' but version belongs to '${current.diagram_id}'`,
      [{ path: 'diagram_id', message: 'mismatch' }]
    );
  }
  const draft = cloneIR(current.ir);
  const log = mutate(draft, feedback);

  const orphans = findOrphans(draft);
  if (orphans.length) {
    console.warn('[PATCH_REJECTED]', {
      diagram_id: current.diagram_id,
      ir_version: current.ir_version,
      action: feedback.action,
      orphans
    });
    throw new StructuralIntegrityError(orphans);
  }

  const version = makeVersion(current.diagram_id, draft, current.ir_version);
  const diff = diffSummary(current.ir, version.ir);
  console.info('[IR_VERSION]', {
    diagram_id: version.diagram_id,
    ir_version: version.ir_version,
    parent_version: version.parent_version,
    action: feedback.action,
    diff: diff.text
  });
  return {
    version,
    log,
    diff,
    audit: { feedback, mutation_plan: [log], diff_summary: diff, parent_version: current.ir_version }
  };
}
