import type {
  CloudLayer,
  DecodeError,
  DecodeResult,
  ObservationTime,
  Pressure,
  ReportModifier,
  TemperatureReading,
  Visibility,
  WeatherPhenomenon,
  WindInfo
} from '../types/metar';
import { parseFlightCategory } from './flightCategory';
import { REMARKS_MARKER, classifyToken, tokenize } from './metarTokens';
import { describeVisibility } from './visibilityParser';
import { withVariation } from './windParser';

// Station id, timestamp, wind and at least one more group
export const MIN_REPORT_TOKENS = 4;

const STATION_REGEX = /^[A-Z0-9]{4}$/;
// Capture groups: [1] day [2] hour [3] minute, always UTC
const TIMESTAMP_REGEX = /^(\d{2})(\d{2})(\d{2})Z$/;

const pad = (value: number) => value.toString().padStart(2, '0');

function failure(error: DecodeError): DecodeResult {
  return { ok: false, error };
}

export function parseObservationTime(token: string): ObservationTime | undefined {
  const match = token.match(TIMESTAMP_REGEX);
  if (!match) {
    return undefined;
  }

  const day = parseInt(match[1], 10);
  const hour = parseInt(match[2], 10);
  const minute = parseInt(match[3], 10);
  if (day < 1 || day > 31 || hour > 23 || minute > 59) {
    return undefined;
  }

  return {
    day,
    hour,
    minute,
    description: `Observed at ${pad(hour)}:${pad(minute)}Z on day ${pad(day)}`
  };
}

interface SummaryParts {
  weather: readonly WeatherPhenomenon[];
  clouds: readonly CloudLayer[];
  temperature?: TemperatureReading;
  wind?: WindInfo;
}

/**
 * One-line digest: active weather (or the sky when there is none),
 * then temperature, then wind.
 */
export function buildSummary({ weather, clouds, temperature, wind }: SummaryParts): string {
  const parts: string[] = [];

  if (weather.length > 0) {
    parts.push(weather.map(w => w.description).join(', '));
  } else if (clouds.length > 0) {
    parts.push(clouds.map(c => c.description).join(', '));
  }

  if (temperature) {
    parts.push(temperature.description);
  }

  if (wind) {
    parts.push(wind.description);
  }

  return parts.length > 0 ? parts.join(', ') : 'Weather conditions available';
}

/**
 * Decodes a raw METAR into a structured report.
 *
 * Only the station id and timestamp are mandatory. Every other group is
 * matched by pattern; a group that is missing leaves its field undefined and
 * a token nothing recognizes is skipped. Decoding stops at `RMK`.
 *
 * @param stationHint - Station the report was requested for. Only compared
 * against the report's own id, never used to fetch anything.
 */
export function decodeMetar(raw: string, stationHint: string): DecodeResult {
  const tokens = tokenize(raw);

  if (tokens.length === 0) {
    return failure({ kind: 'MalformedReport', message: 'Report is empty' });
  }
  if (tokens.length < MIN_REPORT_TOKENS) {
    return failure({
      kind: 'MalformedReport',
      message: `Report has ${tokens.length} group${tokens.length === 1 ? '' : 's'}; at least ${MIN_REPORT_TOKENS} are needed (station, time, wind and one more)`
    });
  }

  const [station, timestamp] = tokens;
  if (!STATION_REGEX.test(station)) {
    return failure({
      kind: 'InvalidStationId',
      message: `Station identifier "${station}" is not 4 letters or digits`,
      token: station
    });
  }

  const observed = parseObservationTime(timestamp);
  if (!observed) {
    return failure({
      kind: 'InvalidTimestamp',
      message: `Observation time "${timestamp}" is not in DDHHMMZ form`,
      token: timestamp
    });
  }

  let modifier: ReportModifier | undefined;
  let wind: WindInfo | undefined;
  let visibility: Visibility | undefined;
  let temperature: TemperatureReading | undefined;
  let pressure: Pressure | undefined;
  const weather: WeatherPhenomenon[] = [];
  const clouds: CloudLayer[] = [];

  let index = 2;
  while (index < tokens.length && tokens[index] !== REMARKS_MARKER) {
    const classified = classifyToken(tokens, index);
    index += classified.consumed;

    switch (classified.kind) {
      case 'modifier':
        if (!modifier) {
          modifier = classified.modifier;
        }
        break;
      case 'wind':
        if (!wind) {
          wind = classified.wind;
        }
        break;
      case 'windVariation':
        if (wind && !wind.variation) {
          wind = withVariation(wind, classified.variation);
        }
        break;
      case 'visibility':
        if (!visibility) {
          visibility = classified.visibility;
        }
        break;
      case 'weather':
        weather.push(classified.weather);
        break;
      case 'cloud':
        clouds.push(classified.layer);
        break;
      case 'temperature':
        if (!temperature) {
          temperature = classified.reading;
        }
        break;
      case 'pressure':
        if (!pressure) {
          pressure = classified.pressure;
        }
        break;
      case 'unrecognized':
        break;
      default: {
        const unhandled: never = classified;
        throw new Error(`Unhandled token kind: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  const hint = stationHint.trim().toUpperCase();

  return {
    ok: true,
    report: {
      station,
      stationHint: hint,
      matchesHint: hint === '' || hint === station,
      observed,
      modifier,
      wind,
      visibility,
      visibilityDescription: describeVisibility(visibility),
      weather,
      clouds,
      temperature,
      pressure,
      flightCategory: parseFlightCategory(visibility, clouds),
      summary: buildSummary({ weather, clouds, temperature, wind }),
      raw
    }
  };
}
