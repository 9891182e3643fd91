// controllers/weatherController.ts
import { Request, Response } from 'express';
import asyncHandler from '../utils/asyncHandler';
import schemas from '../utils/validationSchemas';
import WeatherService from '../services/weatherService';
import { SearchHistoryEntry } from '../types';

// Listings leave the stored provider payload out
const toHistoryItem = ({ raw_response: _raw, ...item }: SearchHistoryEntry) => item;

export const createWeatherController = (weatherService: WeatherService) => ({

    // --- 1. Current Weather (by city or coordinates) ---
    getCurrentWeather: asyncHandler(async (req: Request, res: Response) => {
        const { query } = schemas.currentWeather.parse({ query: req.query });

        const record = await weatherService.getCurrentWeather(query);

        res.status(200).json(record);
    }),

    // --- 2. Forecast ---
    getForecast: asyncHandler(async (req: Request, res: Response) => {
        const { query } = schemas.forecast.parse({ query: req.query });

        const forecast = await weatherService.getForecast(query.city, query.days);

        res.status(200).json(forecast);
    }),

    // --- 3. Search History ---
    getHistory: asyncHandler(async (req: Request, res: Response) => {
        const { query } = schemas.history.parse({ query: req.query });

        const page = await weatherService.listHistory(query.limit, query.offset);

        res.status(200).json({ total: page.total, items: page.items.map(toHistoryItem) });
    }),

    clearHistory: asyncHandler(async (req: Request, res: Response) => {
        const deleted = await weatherService.clearHistory();

        res.status(200).json({
            message: 'Search history cleared successfully',
            deleted_count: deleted
        });
    }),
});

export type WeatherController = ReturnType<typeof createWeatherController>;
