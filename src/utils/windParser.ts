import type { CompassPoint, WindDirection, WindInfo, WindVariation } from '../types/metar';

// Knots only; MPS and KMH groups are not recognized as wind
const WIND_REGEX = /^(\d{3}|VRB)(\d{2,3})(?:G(\d{2,3}))?KT$/;
const VARIATION_REGEX = /^(\d{3})V(\d{3})$/;

const COMPASS_POINTS: readonly CompassPoint[] = [
  'N', 'NNE', 'NE', 'ENE', 'E', 'ESE', 'SE', 'SSE',
  'S', 'SSW', 'SW', 'WSW', 'W', 'WNW', 'NW', 'NNW'
];

const COMPASS_NAMES: Record<CompassPoint, string> = {
  N: 'north', NNE: 'north-northeast', NE: 'northeast', ENE: 'east-northeast',
  E: 'east', ESE: 'east-southeast', SE: 'southeast', SSE: 'south-southeast',
  S: 'south', SSW: 'south-southwest', SW: 'southwest', WSW: 'west-southwest',
  W: 'west', WNW: 'west-northwest', NW: 'northwest', NNW: 'north-northwest'
};

const SECTOR_DEGREES = 360 / COMPASS_POINTS.length; // 22.5

/**
 * Maps a bearing onto the 16-point compass rose.
 * Each point owns the 22.5° sector centered on it; a bearing exactly on a
 * sector boundary goes to the point with the higher bearing (11.25° is NNE).
 */
export function toCompassPoint(degrees: number): CompassPoint {
  const normalized = ((degrees % 360) + 360) % 360;
  const index = Math.floor(normalized / SECTOR_DEGREES + 0.5) % COMPASS_POINTS.length;
  return COMPASS_POINTS[index];
}

export function compassName(point: CompassPoint): string {
  return COMPASS_NAMES[point];
}

function knots(value: number): string {
  return `${value} ${value === 1 ? 'knot' : 'knots'}`;
}

export function describeWind(
  direction: WindDirection,
  speedKt: number,
  gustKt?: number,
  variation?: WindVariation
): string {
  if (direction.kind === 'calm') {
    return 'Calm wind';
  }

  let text = direction.kind === 'variable'
    ? `Variable wind at ${knots(speedKt)}`
    : `Wind from the ${compassName(direction.compass)} at ${knots(speedKt)}`;

  if (gustKt !== undefined) {
    text += `, gusting to ${knots(gustKt)}`;
  }
  if (variation) {
    text += ` (varying between ${variation.fromDegrees}° and ${variation.toDegrees}°)`;
  }
  return text;
}

/**
 * Decodes `DDDSSKT`, `DDDSSGGGKT`, `VRBSSKT` and calm `00000KT`.
 * Returns undefined for anything else, including directions past 360.
 */
export function parseWind(token: string): WindInfo | undefined {
  const match = token.match(WIND_REGEX);
  if (!match) {
    return undefined;
  }

  const speedKt = parseInt(match[2], 10);
  const gustKt = match[3] !== undefined ? parseInt(match[3], 10) : undefined;

  let direction: WindDirection;
  if (match[1] === 'VRB') {
    direction = { kind: 'variable' };
  } else {
    const degrees = parseInt(match[1], 10);
    if (degrees > 360) {
      return undefined;
    }
    direction = degrees === 0 && speedKt === 0 && gustKt === undefined
      ? { kind: 'calm' }
      : { kind: 'degrees', degrees, compass: toCompassPoint(degrees) };
  }

  return {
    direction,
    speedKt,
    gustKt,
    description: describeWind(direction, speedKt, gustKt)
  };
}

/**
 * Decodes the `dddVddd` group that follows the wind when the direction swings
 * by 60° or more.
 */
export function parseWindVariation(token: string): WindVariation | undefined {
  const match = token.match(VARIATION_REGEX);
  if (!match) {
    return undefined;
  }
  const fromDegrees = parseInt(match[1], 10);
  const toDegrees = parseInt(match[2], 10);
  if (fromDegrees > 360 || toDegrees > 360) {
    return undefined;
  }
  return { fromDegrees, toDegrees };
}

export function withVariation(wind: WindInfo, variation: WindVariation): WindInfo {
  return {
    ...wind,
    variation,
    description: describeWind(wind.direction, wind.speedKt, wind.gustKt, variation)
  };
}
