import { IHistoryStore } from './IHistoryStore';
import { MemoryHistoryStore } from './MemoryHistoryStore';
import { MongoHistoryStore } from './MongoHistoryStore';
import { AppConfig } from '../../utils/config';
import logger from '../../utils/logger';

export const createHistoryStore = (settings: AppConfig['history']): IHistoryStore => {
    if (settings.store === 'memory') {
        logger.warn('⚠️ Using in-memory search history. Entries are lost on restart.');
        return new MemoryHistoryStore();
    }
    return new MongoHistoryStore();
};

export type { IHistoryStore };
export { MemoryHistoryStore, MongoHistoryStore };
