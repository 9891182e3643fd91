import { mapCurrent, mapForecast } from '../../services/weatherMapper';
import { ShapeError } from '../../utils/AppError';
import { currentPayload, forecastPayload, forecastInterval, OBSERVED_AT, THREE_HOURS } from '../helpers/payloads';

const shapeFields = (fn: () => unknown): string[] => {
    try {
        fn();
    } catch (err) {
        if (err instanceof ShapeError) return err.fields;
        throw err;
    }
    throw new Error('expected a ShapeError');
};

describe('mapCurrent', () => {
    it('copies nested provider fields verbatim', () => {
        const record = mapCurrent(currentPayload());

        expect(record).toEqual({
            city: 'London',
            country: 'GB',
            latitude: 51.5085,
            longitude: -0.1257,
            temperature: 14.2,
            feels_like: 13.6,
            temp_min: 12.9,
            temp_max: 15.1,
            pressure: 1012,
            humidity: 72,
            visibility: 10000,
            wind_speed: 4.1,
            wind_deg: 240,
            clouds: 75,
            weather: 'Clouds',
            weather_description: 'broken clouds',
            weather_icon: '04d',
            timestamp: new Date('2023-11-14T22:13:20.000Z')
        });
    });

    it('takes the first weather condition', () => {
        const record = mapCurrent(currentPayload({
            weather: [
                { id: 500, main: 'Rain', description: 'light rain', icon: '10d' },
                { id: 701, main: 'Mist', description: 'mist', icon: '50d' }
            ]
        }));

        expect(record.weather).toBe('Rain');
        expect(record.weather_description).toBe('light rain');
        expect(record.weather_icon).toBe('10d');
    });

    it('leaves optional fields undefined when the provider omits them', () => {
        const payload = currentPayload();
        delete payload.visibility;
        delete payload.name;
        delete payload.sys;

        const record = mapCurrent(payload);

        expect(record.visibility).toBeUndefined();
        expect(record.city).toBeUndefined();
        expect(record.country).toBeUndefined();
    });

    it('returns a frozen record', () => {
        expect(Object.isFrozen(mapCurrent(currentPayload()))).toBe(true);
    });

    it('names a missing required nested field', () => {
        const payload = currentPayload({
            main: { feels_like: 13.6, temp_min: 12.9, temp_max: 15.1, pressure: 1012, humidity: 72 }
        });

        expect(() => mapCurrent(payload)).toThrow(ShapeError);
        expect(() => mapCurrent(payload)).toThrow('Malformed provider payload: main.temp');
    });

    it('does not coerce numeric strings', () => {
        const payload = currentPayload({ wind: { speed: '4.1', deg: 240 } });

        expect(shapeFields(() => mapCurrent(payload))).toEqual(['wind.speed']);
    });

    it('treats an empty condition list as a missing first element', () => {
        expect(shapeFields(() => mapCurrent(currentPayload({ weather: [] })))).toEqual(['weather[0]']);
    });

    it('reports every missing field at once', () => {
        const payload = currentPayload();
        delete payload.coord;
        delete payload.dt;

        expect(shapeFields(() => mapCurrent(payload))).toEqual(['dt', 'coord']);
    });

    it('rejects a payload that is not an object', () => {
        expect(shapeFields(() => mapCurrent(null))).toEqual(['(root)']);
    });
});

describe('mapForecast', () => {
    it('maps every interval in provider order', () => {
        const forecast = mapForecast(forecastPayload(4), 1);

        expect(forecast.forecast).toHaveLength(4);
        expect(forecast.forecast.map((item) => item.datetime.getTime())).toEqual([
            OBSERVED_AT * 1000,
            (OBSERVED_AT + THREE_HOURS) * 1000,
            (OBSERVED_AT + 2 * THREE_HOURS) * 1000,
            (OBSERVED_AT + 3 * THREE_HOURS) * 1000
        ]);
    });

    it('echoes the requested day count instead of deriving it', () => {
        const forecast = mapForecast(forecastPayload(3), 5);

        expect(forecast.days_requested).toBe(5);
        expect(forecast.forecast).toHaveLength(3);
    });

    it('maps city metadata and interval fields', () => {
        const forecast = mapForecast(forecastPayload(2), 2);

        expect(forecast.city).toBe('London');
        expect(forecast.country).toBe('GB');
        expect(forecast.latitude).toBe(51.5085);
        expect(forecast.longitude).toBe(-0.1257);
        expect(forecast.forecast[1]).toEqual({
            datetime: new Date((OBSERVED_AT + THREE_HOURS) * 1000),
            temperature: 11,
            feels_like: 10,
            temp_min: 9,
            temp_max: 12,
            pressure: 1010,
            humidity: 80,
            visibility: 9000,
            weather: 'Rain',
            weather_description: 'light rain',
            weather_icon: '10n',
            wind_speed: 5.5,
            wind_deg: 200,
            clouds: 90,
            pop: 0
        });
    });

    it('keeps the provider precipitation probability when present', () => {
        expect(mapForecast(forecastPayload(1), 1).forecast[0].pop).toBe(0.4);
    });

    it('accepts an empty interval list', () => {
        const forecast = mapForecast(forecastPayload(0), 3);

        expect(forecast.forecast).toEqual([]);
        expect(forecast.days_requested).toBe(3);
    });

    it('names the broken interval field', () => {
        const broken = forecastInterval(1);
        broken.wind = { deg: 200 };
        const payload = { ...forecastPayload(2), list: [forecastInterval(0), broken] };

        expect(shapeFields(() => mapForecast(payload, 1))).toEqual(['list[1].wind.speed']);
    });

    it('requires city coordinates', () => {
        const payload = { ...forecastPayload(1), city: { name: 'London', country: 'GB' } };

        expect(shapeFields(() => mapForecast(payload, 1))).toEqual(['city.coord']);
    });
});
