import { RawPayload } from '../../types';

/**
 * Upstream weather source. Implementations resolve with the provider's raw JSON
 * and reject with NotFoundError (unknown location) or TransportError (anything else).
 */
export interface IWeatherProvider {
    name: string;
    fetchCurrentByCity(city: string): Promise<RawPayload>;
    fetchCurrentByCoordinates(lat: number, lon: number): Promise<RawPayload>;
    fetchForecast(city: string, days: number): Promise<RawPayload>;
}
