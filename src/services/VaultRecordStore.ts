import type { Vault } from '../types/index.js';
import type { VaultKey } from '../utils/Address.js';

/** How a vault's live record entered the store. */
export type VaultRecordSource = 'current_allocation' | 'individual_backfill';

export interface VaultRecord {
  vault: Vault;
  source: VaultRecordSource;
}

/**
 * Accumulation map of vault records built during discovery. Backfill decisions
 * read it, so every writer goes through `put`.
 */
export interface VaultRecordStore {
  has(key: VaultKey): boolean;
  get(key: VaultKey): VaultRecord | undefined;
  /** Insert or replace; a current-allocation record is never replaced by a backfilled one. */
  put(record: VaultRecord): void;
  keys(): VaultKey[];
  values(): VaultRecord[];
  readonly size: number;
}

export class InMemoryVaultRecordStore implements VaultRecordStore {
  private readonly records = new Map<VaultKey, VaultRecord>();

  has(key: VaultKey): boolean {
    return this.records.has(key);
  }

  get(key: VaultKey): VaultRecord | undefined {
    return this.records.get(key);
  }

  put(record: VaultRecord): void {
    const existing = this.records.get(record.vault.key);
    if (existing?.source === 'current_allocation' && record.source !== 'current_allocation') {
      return;
    }
    this.records.set(record.vault.key, record);
  }

  keys(): VaultKey[] {
    return [...this.records.keys()].sort();
  }

  values(): VaultRecord[] {
    return this.keys().flatMap((key) => {
      const record = this.records.get(key);
      return record ? [record] : [];
    });
  }

  get size(): number {
    return this.records.size;
  }
}
