import { NotFoundError, VersionConflictError } from '@/lib/errors';
import type { IRVersion } from '@/lib/ir/schema';
import type { DiffSummary, PatchLogEntry } from '@/lib/ir/versioning';
import type { FeedbackRequest } from '@/lib/patch/feedback';

export interface PatchAudit {
  feedback: FeedbackRequest;
  mutation_plan: PatchLogEntry[];
  diff_summary: DiffSummary;
  parent_version: number;
}

export interface VersionRecord {
  version: IRVersion;
  audit?: PatchAudit;
}

/**
 * Backing store for version chains. Implementations only need check-and-set on
 * the head: `append` must fail when the record's parent is not the current head.
 */
export interface IRHistoryStore {
  head(diagramId: string): Promise<VersionRecord | undefined>;
  get(diagramId: string, irVersion: number): Promise<VersionRecord | undefined>;
  list(diagramId: string): Promise<VersionRecord[]>;
  append(record: VersionRecord): Promise<VersionRecord>;
}

export class MemoryHistoryStore implements IRHistoryStore {
  private readonly chains = new Map<string, VersionRecord[]>();

  async head(diagramId: string): Promise<VersionRecord | undefined> {
    const chain = this.chains.get(diagramId);
    return chain?.[chain.length - 1];
  }

  async get(diagramId: string, irVersion: number): Promise<VersionRecord | undefined> {
    return this.chains.get(diagramId)?.find((r) => r.version.ir_version === irVersion);
  }

  async list(diagramId: string): Promise<VersionRecord[]> {
    return [...(this.chains.get(diagramId) ?? [])];
  }

  async append(record: VersionRecord): Promise<VersionRecord> {
    const { diagram_id: diagramId, parent_version: parent, ir_version: irVersion } = record.version;
    const chain = this.chains.get(diagramId) ?? [];
    const current = chain[chain.length - 1];
    if (!current) {
      if (parent !== null) {
        throw new VersionConflictError(`Diagram '${diagramId}' has no history; root version must have parent_version null`);
      }
    } else if (parent !== current.version.ir_version) {
      throw new VersionConflictError(
        `Diagram '${diagramId}' head is v${current.version.ir_version}; refusing v${irVersion} with parent ${parent ?? 'null'}`
      );
    }
    chain.push(record);
    this.chains.set(diagramId, chain);
    return record;
  }
}

export async function listIrHistory(store: IRHistoryStore, diagramId: string): Promise<IRVersion[]> {
  const records = await store.list(diagramId);
  return records.map((r) => r.version);
}

export async function requireHead(store: IRHistoryStore, diagramId: string): Promise<VersionRecord> {
  const head = await store.head(diagramId);
  if (!head) throw new NotFoundError(`Unknown diagram '${diagramId}'`);
  return head;
}
