export type StationInputResult =
  | { ok: true; stationId: string }
  | { ok: false; message: string };

/**
 * Normalizes what the user typed into an ICAO identifier.
 * ICAO codes are always 4 characters; the lookup itself decides whether one exists.
 */
export function validateStationInput(input: string): StationInputResult {
  const stationId = input.trim().toUpperCase();

  if (!stationId) {
    return { ok: false, message: 'Please enter an airport code' };
  }

  if (stationId.length !== 4) {
    return { ok: false, message: 'Airport code must be 4 characters (e.g., KHIO)' };
  }

  if (!/^[A-Z0-9]{4}$/.test(stationId)) {
    return { ok: false, message: 'Airport code may only contain letters and digits' };
  }

  return { ok: true, stationId };
}
