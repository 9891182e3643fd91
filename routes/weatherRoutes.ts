// routes/weatherRoutes.ts
import express from 'express';
import validate from '../middleware/validate';
import schemas from '../utils/validationSchemas';
import { WeatherController } from '../controllers/weatherController';

export const createWeatherRoutes = (controller: WeatherController) => {
    const router = express.Router();

    // 1. Current conditions: ?city= or ?lat=&lon=
    router.get('/', validate(schemas.currentWeather), controller.getCurrentWeather);

    // 2. Forecast: ?city=&days=1..5
    router.get('/forecast', validate(schemas.forecast), controller.getForecast);

    // 3. Search History
    router.get('/history', validate(schemas.history), controller.getHistory);
    router.delete('/history', controller.clearHistory);

    return router;
};
