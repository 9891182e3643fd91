// services/weatherService.ts
import { IWeatherProvider } from './weather/IWeatherProvider';
import { IHistoryStore } from './history/IHistoryStore';
import { mapCurrent, mapForecast } from './weatherMapper';
import {
    CurrentWeatherQuery,
    ForecastRecord,
    HistoryPage,
    NewSearchHistoryEntry,
    RawPayload,
    SearchType,
    WeatherRecord
} from '../types';
import { InvalidInputError } from '../utils/AppError';
import logger from '../utils/logger';

interface WeatherServiceDeps {
    provider: IWeatherProvider;
    historyStore: IHistoryStore;
}

/**
 * Request orchestration: provider call -> mapping -> one history entry.
 * Nothing is recorded unless the payload mapped cleanly.
 */
class WeatherService {
    private readonly provider: IWeatherProvider;
    private readonly historyStore: IHistoryStore;

    constructor({ provider, historyStore }: WeatherServiceDeps) {
        this.provider = provider;
        this.historyStore = historyStore;
    }

    // 1. Current Conditions (city wins over coordinates)
    async getCurrentWeather({ city, lat, lon }: CurrentWeatherQuery): Promise<WeatherRecord> {
        let searchType: SearchType;
        let payload: RawPayload;

        if (city) {
            searchType = 'city';
            payload = await this.provider.fetchCurrentByCity(city);
        } else if (lat !== undefined && lon !== undefined) {
            searchType = 'coordinates';
            payload = await this.provider.fetchCurrentByCoordinates(lat, lon);
        } else {
            throw new InvalidInputError("Either 'city' or both 'lat' and 'lon' parameters are required");
        }

        const record = mapCurrent(payload);

        // Caller-supplied values first, resolved values otherwise
        await this.save({
            search_type: searchType,
            city: city || record.city,
            latitude: lat ?? record.latitude,
            longitude: lon ?? record.longitude,
            raw_response: JSON.stringify(payload)
        });

        return record;
    }

    // 2. Multi-day Forecast
    async getForecast(city: string, days: number): Promise<ForecastRecord> {
        if (!city) {
            throw new InvalidInputError("'city' parameter is required");
        }

        const payload = await this.provider.fetchForecast(city, days);
        const forecast = mapForecast(payload, days);

        await this.save({
            search_type: 'forecast',
            city,
            latitude: forecast.latitude,
            longitude: forecast.longitude,
            forecast_days: days,
            raw_response: JSON.stringify(payload)
        });

        return forecast;
    }

    // 3. History
    listHistory(limit: number, offset: number): Promise<HistoryPage> {
        return this.historyStore.list(limit, offset);
    }

    async clearHistory(): Promise<number> {
        const deleted = await this.historyStore.clear();
        logger.info(`🧹 Cleared ${deleted} search history entries`);
        return deleted;
    }

    private async save(entry: NewSearchHistoryEntry): Promise<void> {
        const id = await this.historyStore.record(entry);
        logger.debug(`📝 Search history #${id} recorded (${entry.search_type})`);
    }
}

export default WeatherService;
