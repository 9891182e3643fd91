import nock from 'nock';
import { OpenWeatherProvider } from '../../services/weather/OpenWeatherProvider';
import { InvalidInputError, NotFoundError, TransportError } from '../../utils/AppError';
import { currentPayload, forecastPayload } from '../helpers/payloads';

const HOST = 'https://weather.test';
const BASE_PATH = '/data/2.5';

describe('OpenWeatherProvider', () => {
    const provider = new OpenWeatherProvider({ apiKey: 'test-key', baseUrl: `${HOST}${BASE_PATH}` });

    beforeAll(() => nock.disableNetConnect());
    afterEach(() => nock.cleanAll());
    afterAll(() => nock.enableNetConnect());

    it('fetches current conditions by city in metric units', async () => {
        const scope = nock(HOST)
            .get(`${BASE_PATH}/weather`)
            .query({ q: 'London', appid: 'test-key', units: 'metric' })
            .reply(200, currentPayload());

        const payload = await provider.fetchCurrentByCity('London');

        expect(payload).toEqual(currentPayload());
        expect(scope.isDone()).toBe(true);
    });

    it('fetches current conditions by coordinates', async () => {
        const scope = nock(HOST)
            .get(`${BASE_PATH}/weather`)
            .query({ lat: '51.5', lon: '-0.12', appid: 'test-key', units: 'metric' })
            .reply(200, currentPayload());

        await provider.fetchCurrentByCoordinates(51.5, -0.12);

        expect(scope.isDone()).toBe(true);
    });

    it('asks for eight intervals per forecast day', async () => {
        const scope = nock(HOST)
            .get(`${BASE_PATH}/forecast`)
            .query({ q: 'London', cnt: '24', appid: 'test-key', units: 'metric' })
            .reply(200, forecastPayload(24));

        const payload = await provider.fetchForecast('London', 3);

        expect(payload.cnt).toBe(24);
        expect(scope.isDone()).toBe(true);
    });

    it.each([0, 6, 2.5])('rejects %p forecast days without calling the provider', async (days) => {
        await expect(provider.fetchForecast('London', days)).rejects.toBeInstanceOf(InvalidInputError);
    });

    it('maps a 404 to NotFoundError', async () => {
        nock(HOST)
            .get(`${BASE_PATH}/forecast`)
            .query(true)
            .reply(404, { cod: '404', message: 'city not found' });

        const request = provider.fetchForecast('Atlantis', 3);

        await expect(request).rejects.toBeInstanceOf(NotFoundError);
        await expect(request).rejects.toThrow('Weather forecast not found for city: Atlantis');
    });

    it('maps other error statuses to TransportError', async () => {
        nock(HOST)
            .get(`${BASE_PATH}/weather`)
            .query(true)
            .reply(500, { cod: 500, message: 'Internal error' });

        const request = provider.fetchCurrentByCity('London');

        await expect(request).rejects.toBeInstanceOf(TransportError);
        await expect(request).rejects.toThrow('Failed to fetch weather data: Request failed with status code 500');
    });

    it('maps network failures to TransportError', async () => {
        nock(HOST)
            .get(`${BASE_PATH}/weather`)
            .query(true)
            .replyWithError('socket hang up');

        const request = provider.fetchCurrentByCoordinates(10, 20);

        await expect(request).rejects.toBeInstanceOf(TransportError);
        await expect(request).rejects.toThrow('socket hang up');
    });

    it('rejects a body that is not a JSON object', async () => {
        nock(HOST)
            .get(`${BASE_PATH}/weather`)
            .query(true)
            .reply(200, 'upstream maintenance', { 'Content-Type': 'text/plain' });

        await expect(provider.fetchCurrentByCity('London')).rejects.toThrow(
            'Failed to fetch weather data: OpenWeatherMap returned a malformed body'
        );
    });

    it('makes a single attempt', async () => {
        nock(HOST).get(`${BASE_PATH}/weather`).query(true).reply(503, {});
        nock(HOST).get(`${BASE_PATH}/weather`).query(true).reply(200, currentPayload());

        await expect(provider.fetchCurrentByCity('London')).rejects.toBeInstanceOf(TransportError);
        // The second interceptor would only be consumed by a retry
        expect(nock.pendingMocks()).toHaveLength(1);
    });
});
