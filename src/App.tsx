import { useState, useEffect, useCallback, useRef } from 'react';
import LoadingSpinner from './components/LoadingSpinner';
import ReportPanel from './components/ReportPanel';
import StationForm from './components/StationForm';
import StatusBar from './components/StatusBar';
import { type FetchError, type StationReport, fetchStationReport } from './services/metarService';
import { type TemperatureUnit, parseTemperatureUnit } from './utils/units';

const REFRESH_INTERVAL_MS = 5 * 60 * 1000; // 5 minutes

const STATION_STORAGE_KEY = 'lastStationIcao';
const TEMP_UNIT_STORAGE_KEY = 'temperatureUnit';

function fetchErrorMessage(stationId: string, error: FetchError): string {
  switch (error.kind) {
    case 'notFound':
    case 'badRequest':
      return `Could not fetch METAR for ${stationId}. Please check the airport code.`;
    case 'rateLimited':
      return `${error.message}. Try again in ${error.retryAfterSeconds ?? 60} seconds.`;
    case 'http':
    case 'network':
      return error.message;
  }
}

function App() {
  const [stationId, setStationId] = useState<string | null>(() => localStorage.getItem(STATION_STORAGE_KEY));
  const [stationReport, setStationReport] = useState<StationReport | null>(null);
  const [isLoading, setIsLoading] = useState(false);
  const [isRefreshing, setIsRefreshing] = useState(false);
  const [lastUpdate, setLastUpdate] = useState<Date | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [autoRefreshEnabled, setAutoRefreshEnabled] = useState(true);
  const [temperatureUnit, setTemperatureUnit] = useState<TemperatureUnit>(() =>
    parseTemperatureUnit(localStorage.getItem(TEMP_UNIT_STORAGE_KEY) ?? import.meta.env.VITE_TEMPERATURE_UNIT)
  );
  const lastRefreshTimeRef = useRef<number>(0);
  const initialStationRef = useRef(stationId);

  const loadReport = useCallback(async (icao: string, isRefresh = false, forceRefresh = false) => {
    // Manual refreshes of the same station are limited to one per interval
    const now = Date.now();
    const timeSinceLastRefresh = now - lastRefreshTimeRef.current;

    if (isRefresh && !forceRefresh && timeSinceLastRefresh < REFRESH_INTERVAL_MS) {
      const remainingSeconds = Math.ceil((REFRESH_INTERVAL_MS - timeSinceLastRefresh) / 1000);
      setError(`Latest report already shown. Refresh available in ${remainingSeconds} seconds.`);
      return;
    }

    if (isRefresh) {
      setIsRefreshing(true);
    } else {
      setIsLoading(true);
      setStationReport(null);
    }
    setError(null);

    try {
      const result = await fetchStationReport(icao);
      setStationReport(result);
      lastRefreshTimeRef.current = now;

      if (result.status === 'fetchFailed') {
        setError(fetchErrorMessage(icao, result.error));
      } else if (result.status === 'decodeFailed') {
        setError(`Could not decode METAR for ${icao}: ${result.error.message}`);
      } else {
        setLastUpdate(new Date());
      }
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : 'Failed to load weather data';
      console.error('[metar] Unexpected failure loading report:', err);
      setError(errorMessage);
    } finally {
      setIsLoading(false);
      setIsRefreshing(false);
    }
  }, []);

  // Initial load of the last station looked up
  useEffect(() => {
    if (initialStationRef.current) {
      void loadReport(initialStationRef.current);
    }
  }, [loadReport]);

  // Auto-refresh every 5 minutes (force refresh to bypass rate limit)
  useEffect(() => {
    if (!stationId || !autoRefreshEnabled) {
      return;
    }

    const interval = setInterval(() => {
      void loadReport(stationId, true, true);
    }, REFRESH_INTERVAL_MS);

    return () => {
      clearInterval(interval);
    };
  }, [stationId, autoRefreshEnabled, loadReport]);

  const handleSubmit = (icao: string) => {
    setStationId(icao);
    localStorage.setItem(STATION_STORAGE_KEY, icao);
    lastRefreshTimeRef.current = 0;
    void loadReport(icao);
  };

  const handleTemperatureUnitChange = (unit: TemperatureUnit) => {
    setTemperatureUnit(unit);
    localStorage.setItem(TEMP_UNIT_STORAGE_KEY, unit);
  };

  return (
    <div style={{ minHeight: '100vh', margin: 0, padding: '32px 20px 80px', backgroundColor: '#000000', color: '#ffffff', fontFamily: 'Arial, sans-serif' }}>
      <h1 style={{ fontSize: '24px', marginTop: 0 }}>METAR Reader</h1>
      <StationForm initialStation={stationId ?? ''} isLoading={isLoading} onSubmit={handleSubmit} />
      {isLoading && <LoadingSpinner stationId={stationId ?? undefined} />}
      {error && (
        <div role="alert" style={{
          marginBottom: '16px',
          backgroundColor: 'rgba(255, 0, 0, 0.8)',
          color: '#ffffff',
          padding: '10px 20px',
          borderRadius: '5px',
          maxWidth: '560px'
        }}>
          Error: {error}
        </div>
      )}
      {stationReport?.status === 'decodeFailed' && (
        <pre style={{ fontFamily: 'monospace', color: '#cccccc', whiteSpace: 'pre-wrap' }}>{stationReport.raw}</pre>
      )}
      {stationReport?.status === 'decoded' && (
        <ReportPanel
          report={stationReport.report}
          stationName={stationReport.metar.name}
          temperatureUnit={temperatureUnit}
          onTemperatureUnitChange={handleTemperatureUnitChange}
          isRefreshing={isRefreshing}
          onRefresh={() => {
            void loadReport(stationReport.stationId, true, false); // Respect rate limit
          }}
        />
      )}
      <StatusBar
        lastUpdate={lastUpdate}
        isRefreshing={isRefreshing}
        stationId={stationId}
        autoRefreshEnabled={autoRefreshEnabled}
        onAutoRefreshChange={setAutoRefreshEnabled}
      />
    </div>
  );
}

export default App;
