import type { Temperature } from '../types/metar';

export type TemperatureUnit = 'F' | 'C';

export const DEFAULT_TEMPERATURE_UNIT: TemperatureUnit = 'F';

/**
 * Whole-degree Fahrenheit, rounded to nearest with .5 going up.
 */
export function celsiusToFahrenheit(celsius: number): number {
  // `+ 0` turns a rounded -0 into 0
  return Math.round((celsius * 9) / 5 + 32) + 0;
}

export function toTemperature(celsius: number): Temperature {
  return { celsius, fahrenheit: celsiusToFahrenheit(celsius) };
}

export function formatTemperature(temperature: Temperature, unit: TemperatureUnit = DEFAULT_TEMPERATURE_UNIT): string {
  if (unit === 'C') {
    return `${temperature.celsius}°C (${temperature.fahrenheit}°F)`;
  }
  return `${temperature.fahrenheit}°F (${temperature.celsius}°C)`;
}

export function hundredthsToInHg(hundredths: number): number {
  return hundredths / 100;
}

export function formatPressure(hundredthsInHg: number): string {
  return `${hundredthsToInHg(hundredthsInHg).toFixed(2)} inHg`;
}

export function parseTemperatureUnit(value: string | undefined): TemperatureUnit {
  const normalized = value?.trim().toUpperCase();
  return normalized === 'C' || normalized === 'F' ? normalized : DEFAULT_TEMPERATURE_UNIT;
}
