import type {
  CloudLayer,
  Pressure,
  ReportModifier,
  TemperatureReading,
  Visibility,
  WeatherPhenomenon,
  WindInfo,
  WindVariation
} from '../types/metar';
import { parseCloudLayer } from './cloudParser';
import { parsePressure } from './pressureParser';
import { parseTemperature } from './temperatureParser';
import { parseMixedVisibility, parseVisibility } from './visibilityParser';
import { parseWeather } from './weatherParser';
import { parseWind, parseWindVariation } from './windParser';

export const REMARKS_MARKER = 'RMK';
const REPORT_TYPE = 'METAR';

/**
 * A body token after classification. `consumed` is how many tokens the
 * match used (the mixed visibility form spans two).
 */
export type MetarToken =
  | { kind: 'wind'; wind: WindInfo; consumed: 1 }
  | { kind: 'windVariation'; variation: WindVariation; consumed: 1 }
  | { kind: 'visibility'; visibility: Visibility; consumed: 1 | 2 }
  | { kind: 'weather'; weather: WeatherPhenomenon; consumed: 1 }
  | { kind: 'cloud'; layer: CloudLayer; consumed: 1 }
  | { kind: 'temperature'; reading: TemperatureReading; consumed: 1 }
  | { kind: 'pressure'; pressure: Pressure; consumed: 1 }
  | { kind: 'modifier'; modifier: ReportModifier; consumed: 1 }
  | { kind: 'unrecognized'; token: string; consumed: 1 };

/**
 * Splits a report on whitespace. A leading `METAR` report-type word is dropped.
 */
export function tokenize(raw: string): string[] {
  const tokens = raw.trim().split(/\s+/).filter(token => token.length > 0);
  return tokens[0] === REPORT_TYPE ? tokens.slice(1) : tokens;
}

/**
 * Classifies the token at `index`, trying each field grammar in a fixed order:
 * wind, visibility, weather, cloud, temperature, altimeter.
 */
export function classifyToken(tokens: readonly string[], index: number): MetarToken {
  const token = tokens[index];

  const wind = parseWind(token);
  if (wind) {
    return { kind: 'wind', wind, consumed: 1 };
  }
  const variation = parseWindVariation(token);
  if (variation) {
    return { kind: 'windVariation', variation, consumed: 1 };
  }

  const next = tokens[index + 1];
  if (next !== undefined) {
    const mixed = parseMixedVisibility(token, next);
    if (mixed) {
      return { kind: 'visibility', visibility: mixed, consumed: 2 };
    }
  }
  const visibility = parseVisibility(token);
  if (visibility) {
    return { kind: 'visibility', visibility, consumed: 1 };
  }

  const weather = parseWeather(token);
  if (weather) {
    return { kind: 'weather', weather, consumed: 1 };
  }

  const layer = parseCloudLayer(token);
  if (layer) {
    return { kind: 'cloud', layer, consumed: 1 };
  }

  const reading = parseTemperature(token);
  if (reading) {
    return { kind: 'temperature', reading, consumed: 1 };
  }

  const pressure = parsePressure(token);
  if (pressure) {
    return { kind: 'pressure', pressure, consumed: 1 };
  }

  if (token === 'AUTO' || token === 'COR') {
    return { kind: 'modifier', modifier: token, consumed: 1 };
  }

  return { kind: 'unrecognized', token, consumed: 1 };
}
