import { IHistoryStore } from './IHistoryStore';
import { assertPageWindow } from './pageWindow';
import SearchHistory, { ISearchHistory } from '../../models/searchHistoryModel';
import Counter from '../../models/counterModel';
import { HistoryPage, NewSearchHistoryEntry, SearchHistoryEntry } from '../../types';
import AppError, { StorageError } from '../../utils/AppError';
import { CONSTANTS } from '../../utils/constants';
import logger from '../../utils/logger';
import dbLoader from '../../utils/dbLoader';

const toStorageError = (err: unknown, action: string): AppError => {
    if (err instanceof AppError) return err;
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`❌ Search history ${action} failed: ${message}`);
    return new StorageError(`Search history ${action} failed: ${message}`);
};

const toEntry = (doc: ISearchHistory): SearchHistoryEntry => ({
    id: doc.entryId,
    search_type: doc.searchType,
    city: doc.city ?? undefined,
    latitude: doc.latitude ?? undefined,
    longitude: doc.longitude ?? undefined,
    forecast_days: doc.forecastDays ?? undefined,
    raw_response: doc.responseData,
    timestamp: doc.timestamp
});

/**
 * MongoDB-backed history. Ids come from an atomic $inc on a counter document,
 * which keeps them unique and increasing across concurrent writers and processes.
 */
export class MongoHistoryStore implements IHistoryStore {
    readonly kind = 'mongo';

    async record(entry: NewSearchHistoryEntry): Promise<number> {
        try {
            const counter = await Counter.findOneAndUpdate(
                { _id: CONSTANTS.HISTORY.COUNTER_KEY },
                { $inc: { seq: 1 } },
                { new: true, upsert: true }
            ).exec();

            if (!counter) {
                throw new StorageError('Search history record failed: could not allocate an id');
            }

            await SearchHistory.create({
                entryId: counter.seq,
                searchType: entry.search_type,
                city: entry.city,
                latitude: entry.latitude,
                longitude: entry.longitude,
                forecastDays: entry.forecast_days,
                responseData: entry.raw_response,
                timestamp: new Date()
            });

            return counter.seq;
        } catch (err: unknown) {
            throw toStorageError(err, 'record');
        }
    }

    async list(limit: number, offset: number): Promise<HistoryPage> {
        assertPageWindow(limit, offset);

        try {
            // Count separately so `total` ignores the page window
            const [total, docs] = await Promise.all([
                SearchHistory.countDocuments().exec(),
                SearchHistory.find()
                    .sort({ timestamp: -1, entryId: -1 })
                    .skip(offset)
                    .limit(limit)
                    .lean<ISearchHistory[]>()
                    .exec()
            ]);

            return { total, items: docs.map(toEntry) };
        } catch (err: unknown) {
            throw toStorageError(err, 'list');
        }
    }

    async clear(): Promise<number> {
        try {
            // The id counter is left alone: ids keep increasing after a clear
            const result = await SearchHistory.deleteMany({}).exec();
            return result.deletedCount;
        } catch (err: unknown) {
            throw toStorageError(err, 'clear');
        }
    }

    isReady(): boolean {
        return dbLoader.isReady();
    }
}
