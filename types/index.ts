// types/index.ts
// Public JSON contract. Field names are snake_case on purpose: they are what clients receive.

// --- 1. Current Conditions ---
export interface WeatherRecord {
  readonly city?: string;
  readonly country?: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly temperature: number; // °C
  readonly feels_like: number;
  readonly temp_min: number;
  readonly temp_max: number;
  readonly pressure: number; // hPa
  readonly humidity: number; // %
  readonly visibility?: number; // meters
  readonly wind_speed: number;
  readonly wind_deg: number;
  readonly clouds: number; // %
  readonly weather: string; // e.g. "Clouds"
  readonly weather_description: string;
  readonly weather_icon: string;
  readonly timestamp: Date;
}

// --- 2. Forecast ---
export interface ForecastItem {
  readonly datetime: Date;
  readonly temperature: number;
  readonly feels_like: number;
  readonly temp_min: number;
  readonly temp_max: number;
  readonly pressure: number;
  readonly humidity: number;
  readonly visibility?: number;
  readonly weather: string;
  readonly weather_description: string;
  readonly weather_icon: string;
  readonly wind_speed: number;
  readonly wind_deg: number;
  readonly clouds: number;
  readonly pop: number; // Probability of precipitation, 0.0 - 1.0
}

export interface ForecastRecord {
  readonly city: string;
  readonly country: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly days_requested: number;
  readonly forecast: readonly ForecastItem[];
}

// --- 3. Search History ---
export type SearchType = 'city' | 'coordinates' | 'forecast';

// What a caller hands to the store. id and timestamp are assigned on write.
export interface NewSearchHistoryEntry {
  search_type: SearchType;
  city?: string;
  latitude?: number;
  longitude?: number;
  forecast_days?: number;
  raw_response: string; // JSON of the provider payload
}

export interface SearchHistoryEntry extends Readonly<NewSearchHistoryEntry> {
  readonly id: number;
  readonly timestamp: Date;
}

export interface HistoryPage {
  total: number;
  items: SearchHistoryEntry[];
}

// --- 4. Request Inputs ---
export interface CurrentWeatherQuery {
  city?: string;
  lat?: number;
  lon?: number;
}

// --- 5. Provider Payloads ---
// Opaque until the mapper validates it
export type RawPayload = Record<string, unknown>;
