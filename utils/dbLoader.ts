// utils/dbLoader.ts
import mongoose from 'mongoose';
import logger from './logger';

export interface MongoSettings {
    mongoUri: string;
    mongoPoolSize: number;
}

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * MongoDB connection loader with exponential backoff between attempts.
 */
class DbLoader {
    private isConnected: boolean = false;
    private readonly MAX_RETRIES = 10;
    private readonly BASE_DELAY_MS = 1000; // Start with 1 second

    public async connect(settings: MongoSettings): Promise<void> {
        if (this.isConnected) {
            logger.info('ℹ️ Database connection already active.');
            return;
        }

        logger.info('🚀 Connecting to MongoDB...');

        let retries = 0;

        while (retries < this.MAX_RETRIES) {
            try {
                // Clear previous listeners to avoid duplicates on reconnect
                mongoose.connection.removeAllListeners('error');
                mongoose.connection.removeAllListeners('disconnected');

                mongoose.connection.on('error', (err: Error) => logger.error(`🔥 MongoDB Error: ${err.message}`));
                mongoose.connection.on('disconnected', () => logger.warn('⚠️ MongoDB Disconnected'));

                await mongoose.connect(settings.mongoUri, {
                    maxPoolSize: settings.mongoPoolSize,
                    minPoolSize: 2,
                    serverSelectionTimeoutMS: 5000,
                    socketTimeoutMS: 45000,
                });

                this.isConnected = true;
                logger.info('✅ MongoDB Connected');
                return;

            } catch (err: unknown) {
                retries++;

                if (retries >= this.MAX_RETRIES) {
                    logger.error(`❌ Could not connect to MongoDB after ${this.MAX_RETRIES} attempts.`);
                    throw err;
                }

                // Exponential Backoff: 2s, 4s, 8s, 16s... max 30s
                const delay = Math.min(this.BASE_DELAY_MS * Math.pow(2, retries), 30000);

                logger.error(`⚠️ MongoDB Connection Failed (Attempt ${retries}/${this.MAX_RETRIES}). Retrying in ${delay / 1000}s... Error: ${errorMessage(err)}`);

                await new Promise((res) => setTimeout(res, delay));
            }
        }
    }

    public isReady(): boolean {
        return mongoose.connection.readyState === 1;
    }

    public async disconnect(): Promise<void> {
        if (!this.isConnected) return;

        try {
            logger.info('🛑 Closing MongoDB connection...');
            await mongoose.disconnect();
            this.isConnected = false;
            logger.info('✅ MongoDB closed gracefully.');
        } catch (err: unknown) {
            logger.error(`⚠️ Error during disconnect: ${errorMessage(err)}`);
        }
    }
}

export default new DbLoader();
