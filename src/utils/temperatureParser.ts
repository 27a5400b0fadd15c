import type { TemperatureReading } from '../types/metar';
import { formatTemperature, toTemperature } from './units';

// Capture groups: [1] temperature [2] dewpoint (may be missing), M marks below zero
const TEMPERATURE_REGEX = /^(M?\d{2})\/(M?\d{2})?$/;

function toCelsius(value: string): number {
  // `+ 0` keeps M00 from becoming -0
  return value.startsWith('M') ? -parseInt(value.slice(1), 10) + 0 : parseInt(value, 10);
}

/**
 * Decodes `TT/DD`, e.g. `21/M01`. `M05` is -5°C. A trailing `/` with no
 * dewpoint gives a reading without one.
 */
export function parseTemperature(token: string): TemperatureReading | undefined {
  const match = token.match(TEMPERATURE_REGEX);
  if (!match) {
    return undefined;
  }

  const temperature = toTemperature(toCelsius(match[1]));
  if (match[2] === undefined) {
    return { temperature, description: formatTemperature(temperature) };
  }

  const dewpoint = toTemperature(toCelsius(match[2]));
  return {
    temperature,
    dewpoint,
    description: formatTemperature(temperature),
    dewpointDescription: `Dewpoint ${formatTemperature(dewpoint)}`
  };
}
