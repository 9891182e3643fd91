// utils/validationSchemas.ts
import { z } from 'zod';
import { CONSTANTS } from './constants';

// Query strings arrive as strings; a blank value counts as "not provided"
const blankToUndefined = (value: unknown) => (value === '' ? undefined : value);

/**
 * Reusable Validation Rules
 */
const rules = {
    city: z.string().trim().min(1, 'City cannot be empty').max(100, 'City cannot exceed 100 characters'),

    latitude: z.preprocess(
        blankToUndefined,
        z.coerce.number({ invalid_type_error: 'Latitude must be a number' })
            .min(-90, 'Latitude must be between -90 and 90')
            .max(90, 'Latitude must be between -90 and 90')
            .optional()
    ),

    longitude: z.preprocess(
        blankToUndefined,
        z.coerce.number({ invalid_type_error: 'Longitude must be a number' })
            .min(-180, 'Longitude must be between -180 and 180')
            .max(180, 'Longitude must be between -180 and 180')
            .optional()
    ),

    days: z.preprocess(
        blankToUndefined,
        z.coerce.number().int('Days must be a whole number')
            .min(CONSTANTS.PROVIDER.MIN_FORECAST_DAYS, 'Days must be between 1 and 5')
            .max(CONSTANTS.PROVIDER.MAX_FORECAST_DAYS, 'Days must be between 1 and 5')
            .default(CONSTANTS.PROVIDER.MAX_FORECAST_DAYS)
    ),

    // Pagination
    limit: z.preprocess(
        blankToUndefined,
        z.coerce.number().int().min(1).max(CONSTANTS.HISTORY.MAX_LIMIT).default(CONSTANTS.HISTORY.DEFAULT_LIMIT)
    ),
    offset: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(0)),
};

const schemas = {
    // GET /weather
    currentWeather: z.object({
        query: z.object({
            city: z.preprocess(blankToUndefined, rules.city.optional()),
            lat: rules.latitude,
            lon: rules.longitude
        })
    }),

    // GET /weather/forecast
    forecast: z.object({
        query: z.object({
            city: z.string({ required_error: 'City is required' }).pipe(rules.city),
            days: rules.days
        })
    }),

    // GET /weather/history
    history: z.object({
        query: z.object({
            limit: rules.limit,
            offset: rules.offset
        })
    }),
};

export default schemas;
