import { IHistoryStore } from './IHistoryStore';
import { assertPageWindow } from './pageWindow';
import { HistoryPage, NewSearchHistoryEntry, SearchHistoryEntry } from '../../types';

type Clock = () => Date;

/**
 * In-process history store. Backs HISTORY_STORE=memory and the test suite.
 * Ids are taken synchronously before any await, so concurrent record() calls never collide.
 */
export class MemoryHistoryStore implements IHistoryStore {
    readonly kind = 'memory';
    private entries: SearchHistoryEntry[] = [];
    private lastId = 0;

    constructor(private readonly now: Clock = () => new Date()) {}

    async record(entry: NewSearchHistoryEntry): Promise<number> {
        const id = ++this.lastId;
        this.entries.push(Object.freeze({ ...entry, id, timestamp: this.now() }));
        return id;
    }

    async list(limit: number, offset: number): Promise<HistoryPage> {
        assertPageWindow(limit, offset);

        const newestFirst = [...this.entries].sort(
            (a, b) => b.timestamp.getTime() - a.timestamp.getTime() || b.id - a.id
        );

        return {
            total: this.entries.length,
            items: newestFirst.slice(offset, offset + limit)
        };
    }

    async clear(): Promise<number> {
        const deleted = this.entries.length;
        this.entries = [];
        return deleted;
    }

    isReady(): boolean {
        return true;
    }
}
