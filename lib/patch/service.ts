import { listIrHistory, requireHead, type IRHistoryStore, type VersionRecord } from '@/lib/ir/history';
import type { IRVersion } from '@/lib/ir/schema';
import { applyFeedback, type PatchResult } from '@/lib/patch/engine';
import { parseFeedback } from '@/lib/patch/feedback';

/**
 * Composes a history store with the patch engine. Calls for one diagram run
 * strictly one after another; different diagrams do not wait on each other.
 */
export class FeedbackService {
  private readonly queues = new Map<string, Promise<void>>();

  constructor(private readonly store: IRHistoryStore) {}

  async create(version: IRVersion): Promise<VersionRecord> {
    return this.serialize(version.diagram_id, () => this.store.append({ version }));
  }

  async apply(input: unknown): Promise<PatchResult> {
    const feedback = parseFeedback(input);
    return this.serialize(feedback.diagram_id, async () => {
      const head = await requireHead(this.store, feedback.diagram_id);
      const result = applyFeedback(feedback, head.version);
      await this.store.append({ version: result.version, audit: result.audit });
      return result;
    });
  }

  async current(diagramId: string): Promise<IRVersion> {
    return (await requireHead(this.store, diagramId)).version;
  }

  async history(diagramId: string): Promise<IRVersion[]> {
    return listIrHistory(this.store, diagramId);
  }

  private serialize<T>(diagramId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(diagramId) ?? Promise.resolve();
    const run = previous.then(task);
    this.queues.set(
      diagramId,
      run.then(
        () => undefined,
        () => undefined
      )
    );
    return run;
  }
}
