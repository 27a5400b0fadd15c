import type { DecodeError, DecodedReport, METAR } from '../types/metar';
import { decodeMetar } from '../utils/metarParser';

// Use proxy in development, or use environment variable for production proxy
// In production, set VITE_PROXY_URL to your backend proxy server URL
export const METAR_API_URL = import.meta.env.DEV
  ? '/api/metar'  // Vite proxy in development
  : (import.meta.env.VITE_PROXY_URL || 'http://localhost:3001/api/metar');  // Production proxy

export type FetchErrorKind = 'notFound' | 'rateLimited' | 'badRequest' | 'http' | 'network';

export interface FetchError {
  kind: FetchErrorKind;
  message: string;
  status?: number;
  retryAfterSeconds?: number;
}

export type FetchResult =
  | { ok: true; raw: string; metar: METAR }
  | { ok: false; error: FetchError };

export type StationReport =
  | { status: 'decoded'; stationId: string; report: DecodedReport; metar: METAR }
  | { status: 'decodeFailed'; stationId: string; raw: string; error: DecodeError }
  | { status: 'fetchFailed'; stationId: string; error: FetchError };

function isMETAR(value: unknown): value is METAR {
  return typeof value === 'object' && value !== null;
}

// Handle different response formats - could be array or object with data property
function toMETARList(responseData: unknown): METAR[] {
  if (Array.isArray(responseData)) {
    return responseData.filter(isMETAR);
  }
  if (isMETAR(responseData) && 'data' in responseData && Array.isArray(responseData.data)) {
    return responseData.data.filter(isMETAR);
  }
  return [];
}

function notFound(stationId: string): FetchResult {
  return { ok: false, error: { kind: 'notFound', message: `No METAR available for ${stationId}` } };
}

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.trim() === '' || text.trim().toLowerCase().startsWith('no metar')) {
    return null;
  }
  return JSON.parse(text);
}

/**
 * Fetches the latest raw METAR for a station from the Aviation Weather Center API.
 * Never throws; failures come back as a tagged FetchError.
 */
export async function fetchRawMetar(stationId: string): Promise<FetchResult> {
  const normalizedId = stationId.trim().toUpperCase();
  const url = `${METAR_API_URL}?ids=${encodeURIComponent(normalizedId)}&format=json`;

  let response: Response;
  try {
    response = await fetch(url);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[metar] Request for ${normalizedId} failed:`, message);
    return { ok: false, error: { kind: 'network', message: `Could not reach the weather service: ${message}` } };
  }

  // 204 No Content: station exists but has nothing recent
  if (response.status === 204) {
    return notFound(normalizedId);
  }

  if (response.status === 429) {
    const retryAfter = response.headers.get('Retry-After');
    const parsed = retryAfter ? parseInt(retryAfter, 10) : NaN;
    const retryAfterSeconds = Number.isNaN(parsed) ? 60 : parsed;
    console.warn(`[metar] Rate limited, retry after ${retryAfterSeconds}s`);
    return {
      ok: false,
      error: { kind: 'rateLimited', message: 'Rate limited by Aviation Weather API', status: 429, retryAfterSeconds }
    };
  }

  if (response.status === 400) {
    return { ok: false, error: { kind: 'badRequest', message: `Invalid METAR request for ${normalizedId}`, status: 400 } };
  }

  if (!response.ok) {
    console.warn(`[metar] ${normalizedId}: HTTP ${response.status} ${response.statusText}`);
    return {
      ok: false,
      error: { kind: 'http', message: `Failed to fetch METAR: ${response.statusText} (${response.status})`, status: response.status }
    };
  }

  let responseData: unknown;
  try {
    responseData = await readBody(response);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[metar] Unreadable response for ${normalizedId}:`, message);
    return { ok: false, error: { kind: 'http', message: `Unreadable response from the weather service: ${message}`, status: response.status } };
  }

  // Most recent observation comes first
  const metar = toMETARList(responseData)[0];
  const raw = (metar?.rawOb || metar?.rawText || '').trim();
  if (!metar || !raw) {
    return notFound(normalizedId);
  }

  return { ok: true, raw, metar };
}

/**
 * Fetches and decodes the latest report for a station.
 */
export async function fetchStationReport(stationId: string): Promise<StationReport> {
  const normalizedId = stationId.trim().toUpperCase();
  const fetched = await fetchRawMetar(normalizedId);
  if (!fetched.ok) {
    return { status: 'fetchFailed', stationId: normalizedId, error: fetched.error };
  }

  const decoded = decodeMetar(fetched.raw, normalizedId);
  if (!decoded.ok) {
    console.warn(`[metar] Could not decode report for ${normalizedId}: ${decoded.error.message}`);
    return { status: 'decodeFailed', stationId: normalizedId, raw: fetched.raw, error: decoded.error };
  }

  return { status: 'decoded', stationId: normalizedId, report: decoded.report, metar: fetched.metar };
}
