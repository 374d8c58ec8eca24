// PurpleAir Service - answers air quality, humidity and temperature questions from a sensor
import { Handler, KeyPhrase, Result, Service, Status, StatusNotifier, Token } from '../interfaces';
import { isRecord } from '../models';
import { BaseComponent, BaseHandler } from '../services/BaseComponent';
import { KeyPhraseMatcher } from '../services/KeyPhraseMatcher';

export type Reading = 'air_quality_index' | 'air_quality' | 'humidity' | 'temperature';

export type SensorData = Record<string, unknown>;

export interface SensorResponse {
  ok: boolean;
  status: number;
  body?: { cancel(): Promise<void> } | null;
  json(): Promise<unknown>;
}

export type FetchFunction = (url: string) => Promise<SensorResponse>;

export interface PurpleAirOptions {
  baseUrl?: string;
  cacheTtlMs?: number;
  fetchFn?: FetchFunction;
}

// Longer phrases first so "air quality index" is not taken as "air quality"
const READINGS: [KeyPhrase, Reading][] = [
  [['air', 'quality', 'index'], 'air_quality_index'],
  [['air', 'quality'], 'air_quality'],
  [['humidity'], 'humidity'],
  [['temperature'], 'temperature']
];

const PREFIXES: KeyPhrase[] = [
  ['what', 'is', 'the'],
  ['whats', 'the']
];

export function describeAirQuality(aqi: number): string {
  if (aqi < 50) return 'okay';
  if (aqi < 100) return 'acceptable';
  if (aqi < 150) return 'poor';
  if (aqi < 200) return 'bad';
  if (aqi < 250) return 'hazardous';
  return 'extremely hazardous';
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

class PurpleAirHandler extends BaseHandler {
  private readonly owner: PurpleAirService;
  private readonly reading: Reading;

  constructor(service: PurpleAirService, tokens: readonly Token[], reading: Reading) {
    super(service, tokens, 1.0, true);
    this.owner = service;
    this.reading = reading;
  }

  public async handle(): Promise<Result | null> {
    const data = await this.owner.getData();
    const location = typeof data.DEVICE_LOCATIONTYPE === 'string' ? data.DEVICE_LOCATIONTYPE : '';
    const where = location ? ` ${location}` : '';

    switch (this.reading) {
      case 'air_quality_index':
      case 'air_quality': {
        const pm = toNumber(data.PM2_5Value);
        if (pm === null) {
          return this.createResult(`The air quality${where} is unknown.`);
        }
        // A rough approximation of the AQI from the PM2.5 value
        const aqi = (pm * pm) / 285;
        if (this.reading === 'air_quality_index') {
          return this.createResult(`The air quality index${where} is ${Math.trunc(aqi)}.`);
        }
        return this.createResult(`The air quality${where} is ${describeAirQuality(aqi)}.`);
      }
      case 'humidity': {
        const humidity = toNumber(data.humidity);
        const what = humidity === null ? 'unknown' : `${humidity} percent`;
        return this.createResult(`The humidity${where} is ${what}.`);
      }
      case 'temperature': {
        const temperature = toNumber(data.temp_f);
        const what = temperature === null ? 'unknown' : `${temperature} degrees fahrenheit`;
        return this.createResult(`The temperature${where} is ${what}.`);
      }
    }
  }
}

export class PurpleAirService extends BaseComponent implements Service {
  private readonly sensorId: number;
  private readonly baseUrl: string;
  private readonly cacheTtlMs: number;
  private readonly fetchFn: FetchFunction;
  private cache: { fetchedAt: number; data: SensorData } | null = null;

  constructor(notifier: StatusNotifier | null, sensorId: number, options: PurpleAirOptions = {}) {
    super(notifier);
    this.sensorId = sensorId;
    this.baseUrl = options.baseUrl ?? 'https://www.purpleair.com/json';
    this.cacheTtlMs = options.cacheTtlMs ?? 60000;
    this.fetchFn = options.fetchFn ?? ((url: string) => fetch(url, { headers: { 'content-type': 'text/plain' } }));
  }

  public async evaluate(tokens: readonly Token[]): Promise<Handler | null> {
    const words = KeyPhraseMatcher.wordsOf(tokens);
    for (const [what, reading] of READINGS) {
      for (const prefix of PREFIXES) {
        if (KeyPhraseMatcher.listIndex(words, [...prefix, ...what]) === 0) {
          return new PurpleAirHandler(this, tokens, reading);
        }
      }
    }
    return null;
  }

  /**
   * The first entry of the sensor's results, served from the cache while it
   * is fresh since the upstream API throttles frequent callers.
   */
  public async getData(): Promise<SensorData> {
    const now = Date.now();
    if (this.cache && now - this.cache.fetchedAt < this.cacheTtlMs) {
      return this.cache.data;
    }

    this.notify(Status.WORKING);
    try {
      const response = await this.fetchFn(`${this.baseUrl}?show=${this.sensorId}`);
      if (!response.ok) {
        // Release the connection, the error body is not used
        await response.body?.cancel();
        throw new Error(`PurpleAir request failed with status ${response.status}`);
      }

      const raw = await response.json();
      const results = isRecord(raw) && Array.isArray(raw.results) ? raw.results : [];
      const first: unknown = results[0];
      const data: SensorData = isRecord(first) ? first : {};

      this.cache = { fetchedAt: now, data };
      return data;
    } finally {
      this.notify(Status.IDLE);
    }
  }
}
