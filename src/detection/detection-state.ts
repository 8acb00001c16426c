import type { StrategyName } from '../types/models.js';

export interface DetectionStateEntry {
  community_id: string;
  strategy_name: StrategyName;
  field_name: string;
  last_value: string;
  updated_at: Date;
}

/**
 * Baselines of one community, owned by that community's poll task. Strategies read
 * and write only their own entries; the whole set is saved after every poll.
 */
export class CommunityDetectionState {
  private values = new Map<string, DetectionStateEntry>();

  constructor(readonly communityId: string, entries: DetectionStateEntry[] = []) {
    for (const entry of entries) {
      this.values.set(keyOf(entry.strategy_name, entry.field_name), entry);
    }
  }

  get(strategy: StrategyName, field: string): string | undefined {
    return this.values.get(keyOf(strategy, field))?.last_value;
  }

  /**
   * Numeric baseline, or null when missing or corrupt (non-numeric, negative, non-finite).
   */
  getCount(strategy: StrategyName, field: string): number | null {
    const raw = this.get(strategy, field);
    if (raw === undefined || raw.trim() === '') {
      return null;
    }
    const value = Number(raw);
    if (!Number.isFinite(value) || value < 0) {
      return null;
    }
    return value;
  }

  set(strategy: StrategyName, field: string, value: string | number, at: Date = new Date()): void {
    this.values.set(keyOf(strategy, field), {
      community_id: this.communityId,
      strategy_name: strategy,
      field_name: field,
      last_value: String(value),
      updated_at: at,
    });
  }

  entries(): DetectionStateEntry[] {
    return [...this.values.values()];
  }
}

function keyOf(strategy: StrategyName, field: string): string {
  return `${strategy}/${field}`;
}

export interface DetectionStateStore {
  load(communityId: string): Promise<CommunityDetectionState>;
  save(state: CommunityDetectionState): Promise<void>;
  discard(communityId: string): Promise<void>;
}

export class InMemoryDetectionStateStore implements DetectionStateStore {
  private byCommunity = new Map<string, DetectionStateEntry[]>();

  async load(communityId: string): Promise<CommunityDetectionState> {
    return new CommunityDetectionState(communityId, this.byCommunity.get(communityId) ?? []);
  }

  async save(state: CommunityDetectionState): Promise<void> {
    this.byCommunity.set(state.communityId, state.entries().map((e) => ({ ...e })));
  }

  async discard(communityId: string): Promise<void> {
    this.byCommunity.delete(communityId);
  }
}
