// routes/index.ts
import express from 'express';
import { createWeatherRoutes } from './weatherRoutes';
import { WeatherController } from '../controllers/weatherController';

export const createApiRouter = (weatherController: WeatherController) => {
    const router = express.Router();

    router.use('/weather', createWeatherRoutes(weatherController));

    // --- 404 Handler ---
    // Catches any request that didn't match the routes above
    router.use('*', (req, res) => {
        res.status(404).json({
            status: 'fail',
            message: 'Endpoint Not Found',
            path: req.originalUrl
        });
    });

    return router;
};
