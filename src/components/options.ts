// Typed readers for the untyped options given to component factories
import { ComponentOptions } from '../interfaces';
import { isRecord } from '../models';

export function numberOption(options: ComponentOptions, key: string, fallback: number): number {
  const value = options[key];
  if (value === undefined || value === null) return fallback;
  // Number('') is 0, so blank text is refused rather than parsed
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof parsed !== 'number' || Number.isNaN(parsed)) {
    throw new Error(`Option "${key}" must be a number`);
  }
  return parsed;
}

export function requiredNumberOption(options: ComponentOptions, key: string): number {
  const value = numberOption(options, key, Number.NaN);
  if (Number.isNaN(value)) {
    throw new Error(`Option "${key}" was not given`);
  }
  return value;
}

export function stringOption(options: ComponentOptions, key: string, fallback: string): string {
  const value = options[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'string') {
    throw new Error(`Option "${key}" must be a string`);
  }
  return value;
}

export function optionalStringOption(options: ComponentOptions, key: string): string | undefined {
  const value = options[key];
  return value === undefined || value === null ? undefined : stringOption(options, key, '');
}

export function booleanOption(options: ComponentOptions, key: string, fallback: boolean): boolean {
  const value = options[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'boolean') {
    throw new Error(`Option "${key}" must be true or false`);
  }
  return value;
}

export function stringMapOption(options: ComponentOptions, key: string): Map<string, string> {
  const value = options[key];
  const result = new Map<string, string>();
  if (value === undefined || value === null) return result;
  if (!isRecord(value)) {
    throw new Error(`Option "${key}" must be an object of strings`);
  }
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new Error(`Option "${key}.${name}" must be a string`);
    }
    result.set(name, entry);
  }
  return result;
}
