// server.ts
import dotenv from 'dotenv';

import { loadConfig } from './utils/config';
import logger from './utils/logger';
import dbLoader from './utils/dbLoader';
import { registerShutdownHandler } from './utils/shutdownHandler';
import { createApp } from './app';
import { createHistoryStore } from './services/history';
import { OpenWeatherProvider } from './services/weather/OpenWeatherProvider';

dotenv.config();

const startServer = async () => {
    try {
        logger.info('🚀 Starting Server Initialization...');

        // 1. Configuration (built once, passed down explicitly)
        const config = loadConfig(process.env);

        // 2. Connect Storage
        if (config.history.store === 'mongo') {
            await dbLoader.connect(config.history);
        }

        const app = createApp({
            config,
            provider: new OpenWeatherProvider(config.openWeather),
            historyStore: createHistoryStore(config.history),
        });

        // 3. Start HTTP Server
        const server = app.listen(config.port, config.host, () => {
            logger.info(`✅ Server running on http://${config.host}:${config.port}`);
        });

        // 4. Register Graceful Shutdown
        registerShutdownHandler('Weather API', [
            () => new Promise<void>((resolve, reject) => {
                server.close((err) => {
                    if (err) reject(err);
                    else {
                        logger.info('Http server closed.');
                        resolve();
                    }
                });
            }),
            async () => { await dbLoader.disconnect(); }
        ]);

    } catch (err) {
        logger.error(`❌ Critical Startup Error: ${err instanceof Error ? err.message : 'Unknown'}`);
        process.exit(1);
    }
};

void startServer();
