// services/weatherMapper.ts
import { z, ZodIssue } from 'zod';
import { ForecastItem, ForecastRecord, WeatherRecord } from '../types';
import { ShapeError } from '../utils/AppError';

// --- Provider (OpenWeatherMap) payload shapes ---
// Required fields are strict: no coercion, no defaults. Only `visibility` and `pop` are optional.

const CoordSchema = z.object({
    lat: z.number(),
    lon: z.number()
});

const MainSchema = z.object({
    temp: z.number(),
    feels_like: z.number(),
    temp_min: z.number(),
    temp_max: z.number(),
    pressure: z.number().int(),
    humidity: z.number().int()
});

const ConditionSchema = z.object({
    main: z.string(),
    description: z.string(),
    icon: z.string()
});

const IntervalFieldsSchema = z.object({
    dt: z.number(),
    main: MainSchema,
    weather: z.array(ConditionSchema).nonempty(),
    wind: z.object({ speed: z.number(), deg: z.number().int() }),
    clouds: z.object({ all: z.number().int() }),
    visibility: z.number().int().nullish()
});

const CurrentPayloadSchema = IntervalFieldsSchema.extend({
    name: z.string().nullish(),
    sys: z.object({ country: z.string().nullish() }).nullish(),
    coord: CoordSchema
});

const ForecastIntervalSchema = IntervalFieldsSchema.extend({
    pop: z.number().default(0)
});

const ForecastPayloadSchema = z.object({
    city: z.object({
        name: z.string(),
        country: z.string(),
        coord: CoordSchema
    }),
    list: z.array(ForecastIntervalSchema)
});

type IntervalFields = z.infer<typeof IntervalFieldsSchema>;

// ['weather', 0, 'main'] -> "weather[0].main"
const formatPath = (issue: ZodIssue): string => {
    let path = issue.path.reduce<string>((acc, segment) => {
        if (typeof segment === 'number') return `${acc}[${segment}]`;
        return acc ? `${acc}.${segment}` : segment;
    }, '');

    // An empty condition array means there is no first element to read
    if (issue.code === 'too_small' && issue.type === 'array') {
        path = `${path}[0]`;
    }
    return path || '(root)';
};

const parseOrThrow = <T extends z.ZodTypeAny>(schema: T, payload: unknown): z.output<T> => {
    const result = schema.safeParse(payload);
    if (!result.success) {
        const fields = Array.from(new Set(result.error.issues.map(formatPath)));
        throw new ShapeError(fields);
    }
    return result.data;
};

const fromEpochSeconds = (seconds: number): Date => new Date(seconds * 1000);

// Fields shared by current conditions and every forecast interval
const mapInterval = (data: IntervalFields) => {
    const [condition] = data.weather;
    return {
        temperature: data.main.temp,
        feels_like: data.main.feels_like,
        temp_min: data.main.temp_min,
        temp_max: data.main.temp_max,
        pressure: data.main.pressure,
        humidity: data.main.humidity,
        visibility: data.visibility ?? undefined,
        wind_speed: data.wind.speed,
        wind_deg: data.wind.deg,
        clouds: data.clouds.all,
        weather: condition.main,
        weather_description: condition.description,
        weather_icon: condition.icon
    };
};

/**
 * Maps an OpenWeatherMap `/weather` response to a WeatherRecord.
 * @throws ShapeError naming every required field that is missing or mistyped
 */
export const mapCurrent = (payload: unknown): WeatherRecord => {
    const data = parseOrThrow(CurrentPayloadSchema, payload);

    return Object.freeze({
        city: data.name ?? undefined,
        country: data.sys?.country ?? undefined,
        latitude: data.coord.lat,
        longitude: data.coord.lon,
        ...mapInterval(data),
        timestamp: fromEpochSeconds(data.dt)
    });
};

/**
 * Maps an OpenWeatherMap `/forecast` response. Interval order is kept as received,
 * and `daysRequested` is echoed back rather than derived from the interval count.
 */
export const mapForecast = (payload: unknown, daysRequested: number): ForecastRecord => {
    const data = parseOrThrow(ForecastPayloadSchema, payload);

    const forecast: ForecastItem[] = data.list.map((item) => Object.freeze({
        datetime: fromEpochSeconds(item.dt),
        ...mapInterval(item),
        pop: item.pop
    }));

    return Object.freeze({
        city: data.city.name,
        country: data.city.country,
        latitude: data.city.coord.lat,
        longitude: data.city.coord.lon,
        days_requested: daysRequested,
        forecast: Object.freeze(forecast)
    });
};
