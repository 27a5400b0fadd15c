import type { Pressure } from '../types/metar';
import { formatPressure, hundredthsToInHg } from './units';

// Altimeter in hundredths of inHg. Q (hPa) groups are not decoded.
const ALTIMETER_REGEX = /^A(\d{4})$/;

export function parsePressure(token: string): Pressure | undefined {
  const match = token.match(ALTIMETER_REGEX);
  if (!match) {
    return undefined;
  }

  const hundredthsInHg = parseInt(match[1], 10);
  return {
    hundredthsInHg,
    inHg: hundredthsToInHg(hundredthsInHg),
    description: `Pressure ${formatPressure(hundredthsInHg)}`
  };
}
