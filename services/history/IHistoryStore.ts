import { HistoryPage, NewSearchHistoryEntry } from '../../types';

/**
 * Append-only search history. The store owns id and timestamp assignment.
 * Implementations reject with StorageError when the backing storage is unavailable.
 */
export interface IHistoryStore {
    readonly kind: 'mongo' | 'memory';

    /** Persists one entry and resolves with its newly assigned id. */
    record(entry: NewSearchHistoryEntry): Promise<number>;

    /** Newest first. `total` counts every stored entry, not just the page. */
    list(limit: number, offset: number): Promise<HistoryPage>;

    /** Removes everything and resolves with the number of entries removed. */
    clear(): Promise<number>;

    isReady(): boolean;
}
