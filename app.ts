// app.ts
import express, { Request, Response, NextFunction } from 'express';
import compression from 'compression';
import helmet from 'helmet';
import hpp from 'hpp';

import logger from './utils/logger';
import { AppConfig } from './utils/config';
import { createErrorHandler } from './middleware/errorMiddleware';
import { createApiRouter } from './routes/index';
import { createWeatherController } from './controllers/weatherController';
import WeatherService from './services/weatherService';
import { IWeatherProvider } from './services/weather/IWeatherProvider';
import { IHistoryStore } from './services/history/IHistoryStore';

export interface AppDependencies {
    config: Pick<AppConfig, 'trustProxyLevel' | 'env'>;
    provider: IWeatherProvider;
    historyStore: IHistoryStore;
}

/**
 * Builds the Express app without binding a port, so tests can drive it directly.
 */
export const createApp = ({ config, provider, historyStore }: AppDependencies) => {
    const app = express();

    // --- 1. Trust Proxy ---
    app.set('trust proxy', config.trustProxyLevel);

    // --- 2. Request Logging ---
    app.use((req: Request, res: Response, next: NextFunction) => {
        if (req.url !== '/health' && req.url !== '/ping') {
            logger.http(`${req.method} ${req.url}`);
        }
        next();
    });

    // --- 3. Security Middleware ---
    app.disable('x-powered-by');
    app.use(helmet());
    app.use(compression());
    app.use(hpp()); // ?city=a&city=b -> last value wins

    app.use(express.json({ limit: '200kb' }));

    // --- 4. System Routes ---
    app.get('/ping', (req: Request, res: Response) => {
        res.status(200).send('OK');
    });

    app.get('/health', (req: Request, res: Response) => {
        const storeStatus = historyStore.isReady() ? 'UP' : 'DOWN';
        const status = storeStatus === 'UP' ? 200 : 503;

        res.status(status).json({
            status: status === 200 ? 'OK' : 'DEGRADED',
            service: 'Weather API',
            store: storeStatus
        });
    });

    // --- 5. Mount Routes ---
    const weatherService = new WeatherService({ provider, historyStore });
    app.use('/', createApiRouter(createWeatherController(weatherService)));

    // --- 6. Error Handling ---
    app.use(createErrorHandler({ exposeStack: config.env === 'development' }));

    return app;
};
