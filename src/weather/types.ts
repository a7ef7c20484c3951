/**
 * Weather lookup data types shared by the provider client, the stores
 * and the orchestrator
 */

/**
 * Current conditions for one place, before persistence
 */
export interface WeatherReading {
    city: string;
    temperature: number;   // °C
    feelsLike: number;     // °C
    description: string;
    humidity: number;      // 0-100
}

/**
 * One completed lookup as stored. Insert-only; never updated.
 */
export interface WeatherRecord extends WeatherReading {
    id: number;
    createdAt: Date;       // UTC, assigned by the store
}

export type FetchMode = 'live' | 'offline';

/**
 * Result of a provider fetch. The offline variant is returned when no
 * provider credential is configured; it is not an error.
 */
export type WeatherFetchResult =
    | { mode: 'live'; reading: WeatherReading }
    | { mode: 'offline'; reading: WeatherReading };

export interface WeatherProvider {
    fetchCurrent(city: string): Promise<WeatherFetchResult>;
    isConfigured(): boolean;
}
