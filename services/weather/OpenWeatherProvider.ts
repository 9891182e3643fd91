import axios, { AxiosInstance } from 'axios';
import { IWeatherProvider } from './IWeatherProvider';
import { RawPayload } from '../../types';
import { AppConfig } from '../../utils/config';
import apiClient from '../../utils/apiClient';
import logger from '../../utils/logger';
import { CONSTANTS } from '../../utils/constants';
import { InvalidInputError, NotFoundError, TransportError } from '../../utils/AppError';

const isRecord = (value: unknown): value is RawPayload =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

type QueryParams = Record<string, string | number>;

export class OpenWeatherProvider implements IWeatherProvider {
    name = 'OpenWeatherMap';

    constructor(
        private readonly settings: AppConfig['openWeather'],
        private readonly http: AxiosInstance = apiClient
    ) {}

    fetchCurrentByCity(city: string): Promise<RawPayload> {
        return this.get('/weather', { q: city }, 'Weather data not found for the specified location');
    }

    fetchCurrentByCoordinates(lat: number, lon: number): Promise<RawPayload> {
        return this.get('/weather', { lat, lon }, 'Weather data not found for the specified location');
    }

    async fetchForecast(city: string, days: number): Promise<RawPayload> {
        const { MIN_FORECAST_DAYS, MAX_FORECAST_DAYS, INTERVALS_PER_DAY } = CONSTANTS.PROVIDER;
        if (!Number.isInteger(days) || days < MIN_FORECAST_DAYS || days > MAX_FORECAST_DAYS) {
            throw new InvalidInputError(`Forecast days must be an integer between ${MIN_FORECAST_DAYS} and ${MAX_FORECAST_DAYS}`);
        }

        // Provider works in 3-hour intervals
        return this.get(
            '/forecast',
            { q: city, cnt: days * INTERVALS_PER_DAY },
            `Weather forecast not found for city: ${city}`
        );
    }

    // Single attempt. No retry, transport default timeout.
    private async get(path: string, query: QueryParams, notFoundMessage: string): Promise<RawPayload> {
        const url = `${this.settings.baseUrl}${path}`;
        logger.debug(`🌤️ ${this.name} GET ${path} ${JSON.stringify(query)}`);

        let data: unknown;
        try {
            const response = await this.http.get<unknown>(url, {
                params: { ...query, appid: this.settings.apiKey, units: CONSTANTS.PROVIDER.UNITS },
            });
            data = response.data;
        } catch (error: unknown) {
            throw this.translateError(error, notFoundMessage);
        }

        if (!isRecord(data)) {
            throw new TransportError(`Failed to fetch weather data: ${this.name} returned a malformed body`);
        }
        return data;
    }

    private translateError(error: unknown, notFoundMessage: string): Error {
        if (!axios.isAxiosError(error)) {
            return new TransportError(`Failed to fetch weather data: ${error instanceof Error ? error.message : String(error)}`);
        }

        const status = error.response?.status;
        if (status === 404) {
            return new NotFoundError(notFoundMessage);
        }
        if (status === 401) {
            logger.error(`❌ ${this.name} Auth Failed (401). Check API Key.`);
        } else {
            logger.warn(`⚠️ ${this.name} request failed: ${status ?? error.code ?? 'network'} - ${error.message}`);
        }
        return new TransportError(`Failed to fetch weather data: ${error.message}`);
    }
}
