import type { PhenomenonCode, WeatherDescriptor, WeatherIntensity, WeatherPhenomenon } from '../types/metar';

// Capture groups: [1] +|- intensity [2] VC proximity [3] descriptor [4] stacked 2-letter codes
const WEATHER_REGEX = /^([-+])?(VC)?(MI|BC|PR|DR|BL|SH|TS|FZ)?((?:[A-Z]{2})*)$/;

export const UNKNOWN_PHENOMENON = '(unknown phenomenon)';

const DESCRIPTOR_LABELS: Record<WeatherDescriptor, string> = {
  SH: 'shower',
  TS: 'thunderstorm',
  FZ: 'freezing',
  BL: 'blowing',
  DR: 'drifting',
  MI: 'shallow',
  BC: 'patches of',
  PR: 'partial'
};

const PHENOMENON_LABELS: Record<string, string> = {
  // Precipitation
  DZ: 'drizzle',
  RA: 'rain',
  SN: 'snow',
  SG: 'snow grains',
  IC: 'ice crystals',
  PL: 'ice pellets',
  GR: 'hail',
  GS: 'small hail/snow pellets',
  UP: 'unknown precipitation',
  // Obscuration
  BR: 'mist',
  FG: 'fog',
  FU: 'smoke',
  VA: 'volcanic ash',
  DU: 'dust',
  SA: 'sand',
  HZ: 'haze',
  PY: 'spray',
  // Other
  PO: 'dust whirls',
  SQ: 'squall',
  FC: 'funnel cloud',
  SS: 'sandstorm',
  DS: 'duststorm'
};

function isDescriptor(code: string | undefined): code is WeatherDescriptor {
  return code !== undefined && Object.prototype.hasOwnProperty.call(DESCRIPTOR_LABELS, code);
}

function toIntensity(marker: string | undefined): WeatherIntensity {
  switch (marker) {
    case '-':
      return 'light';
    case '+':
      return 'heavy';
    default:
      return 'moderate';
  }
}

function splitCodes(codes: string): PhenomenonCode[] {
  const result: PhenomenonCode[] = [];
  for (let i = 0; i < codes.length; i += 2) {
    const code = codes.substring(i, i + 2);
    const label = Object.prototype.hasOwnProperty.call(PHENOMENON_LABELS, code)
      ? PHENOMENON_LABELS[code]
      : UNKNOWN_PHENOMENON;
    result.push({ code, label });
  }
  return result;
}

export function describeWeather(
  intensity: WeatherIntensity,
  vicinity: boolean,
  descriptor: WeatherDescriptor | undefined,
  phenomena: readonly PhenomenonCode[]
): string {
  const words: string[] = [];
  if (intensity !== 'moderate') {
    words.push(intensity);
  }
  if (descriptor) {
    words.push(DESCRIPTOR_LABELS[descriptor]);
  }
  if (phenomena.length > 0) {
    words.push(phenomena.map(p => p.label).join(' and '));
  }
  const text = words.join(' ');
  return vicinity ? `${text} in the vicinity` : text;
}

/**
 * Decodes a present-weather group such as `-RA`, `+TSRA`, `VCFG` or `FZFG`.
 * One token yields one entry, however many phenomenon codes it stacks.
 *
 * A bare token with no intensity, `VC` or descriptor counts as weather only if
 * it starts with a known phenomenon code, so words like `AUTO` are left alone.
 * Unknown codes are otherwise kept and labelled as unknown.
 */
export function parseWeather(token: string): WeatherPhenomenon | undefined {
  const match = token.match(WEATHER_REGEX);
  if (!match) {
    return undefined;
  }

  const descriptor = isDescriptor(match[3]) ? match[3] : undefined;
  const phenomena = splitCodes(match[4]);
  if (!descriptor && phenomena.length === 0) {
    return undefined;
  }

  const hasPrefix = match[1] !== undefined || match[2] !== undefined;
  const leadsWithKnownCode = phenomena.length > 0 && phenomena[0].label !== UNKNOWN_PHENOMENON;
  if (!hasPrefix && !descriptor && !leadsWithKnownCode) {
    return undefined;
  }

  const intensity = toIntensity(match[1]);
  const vicinity = match[2] === 'VC';

  return {
    raw: token,
    intensity,
    vicinity,
    descriptor,
    phenomena,
    description: describeWeather(intensity, vicinity, descriptor, phenomena)
  };
}
