import { FlightCategoryColors, FlightCategoryCriteria, FlightCategoryLabels } from '../types/flightCategory';
import type { DecodedReport, ReportModifier } from '../types/metar';
import { type TemperatureUnit, formatPressure, formatTemperature } from '../utils/units';

interface ReportPanelProps {
  report: DecodedReport;
  stationName?: string;
  temperatureUnit: TemperatureUnit;
  onTemperatureUnitChange: (unit: TemperatureUnit) => void;
  onRefresh?: () => void;
  isRefreshing?: boolean;
}

export const NOT_REPORTED = 'Not reported';

const MODIFIER_LABELS: Record<ReportModifier, string> = {
  AUTO: 'automated station',
  COR: 'corrected report'
};

const FieldRow = ({ label, value }: { label: string; value: string | undefined }) => {
  return (
    <div style={{ display: 'flex', gap: '12px', marginBottom: '6px' }}>
      <strong style={{ color: '#4A9EFF', minWidth: '100px' }}>{label}:</strong>
      <span style={{ color: value === undefined ? '#888' : '#ffffff', fontStyle: value === undefined ? 'italic' : 'normal' }}>
        {value ?? NOT_REPORTED}
      </span>
    </div>
  );
};

export default function ReportPanel({ report, stationName, temperatureUnit, onTemperatureUnitChange, onRefresh, isRefreshing = false }: ReportPanelProps) {
  const categoryColor = FlightCategoryColors[report.flightCategory];
  const reading = report.temperature;

  return (
    <div style={{
      backgroundColor: 'rgba(26, 26, 26, 0.9)',
      border: '1px solid #444',
      borderRadius: '8px',
      padding: '16px',
      width: '560px',
      maxWidth: '90vw',
      color: '#ffffff',
      fontFamily: 'Arial, sans-serif',
      boxShadow: '0 4px 12px rgba(0, 0, 0, 0.5)'
    }}>
      <div style={{ marginBottom: '12px' }}>
        <div style={{ display: 'flex', alignItems: 'center', justifyContent: 'space-between', gap: '8px' }}>
          <div style={{ display: 'flex', alignItems: 'center', gap: '12px' }}>
            <strong style={{ fontSize: '20px' }}>{report.station}</strong>
            <div
              title={FlightCategoryCriteria[report.flightCategory]}
              style={{
                width: '12px',
                height: '12px',
                borderRadius: '50%',
                backgroundColor: categoryColor,
                filter: `drop-shadow(0 0 2px ${categoryColor}) drop-shadow(0 0 4px ${categoryColor})`
              }}
            />
            <span style={{ fontSize: '14px', color: categoryColor, fontWeight: 'bold' }}>
              {FlightCategoryLabels[report.flightCategory]}
            </span>
          </div>
          <div style={{ display: 'flex', gap: '8px' }}>
            {onRefresh && (
              <button
                onClick={onRefresh}
                disabled={isRefreshing}
                style={{
                  backgroundColor: 'rgba(255, 255, 255, 0.1)',
                  color: '#ffffff',
                  border: '1px solid #555',
                  cursor: isRefreshing ? 'wait' : 'pointer',
                  fontSize: '12px',
                  padding: '4px 8px',
                  borderRadius: '4px'
                }}
                title="Fetch the latest report"
              >
                {isRefreshing ? 'Refreshing…' : 'Refresh'}
              </button>
            )}
            <button
              onClick={() => onTemperatureUnitChange(temperatureUnit === 'F' ? 'C' : 'F')}
              style={{
                backgroundColor: 'rgba(255, 255, 255, 0.1)',
                color: '#ffffff',
                border: '1px solid #555',
                cursor: 'pointer',
                fontSize: '12px',
                padding: '4px 8px',
                borderRadius: '4px',
                display: 'flex',
                alignItems: 'center',
                gap: '4px',
                fontWeight: 'bold'
              }}
              title={`Switch to ${temperatureUnit === 'F' ? 'Celsius' : 'Fahrenheit'}`}
            >
              <span style={{ opacity: temperatureUnit === 'F' ? 1 : 0.5 }}>°F</span>
              <span style={{ margin: '0 2px' }}>/</span>
              <span style={{ opacity: temperatureUnit === 'C' ? 1 : 0.5 }}>°C</span>
            </button>
          </div>
        </div>
        {stationName && (
          <div style={{ fontSize: '14px', color: '#cccccc' }}>{stationName}</div>
        )}
      </div>

      {!report.matchesHint && (
        <div style={{ fontSize: '13px', color: '#ffaa00', marginBottom: '8px' }}>
          Report is for {report.station}, requested {report.stationHint}
        </div>
      )}

      <div style={{ fontSize: '15px', marginBottom: '16px' }}>{report.summary}</div>

      <div style={{ fontSize: '14px', lineHeight: '1.6' }}>
        <FieldRow
          label="Observed"
          value={report.modifier
            ? `${report.observed.description} (${MODIFIER_LABELS[report.modifier]})`
            : report.observed.description}
        />
        <FieldRow label="Wind" value={report.wind?.description} />
        <FieldRow label="Visibility" value={report.visibilityDescription} />
        <FieldRow
          label="Weather"
          value={report.weather.length > 0 ? report.weather.map(w => w.description).join(', ') : 'None'}
        />
        <FieldRow
          label="Clouds"
          value={report.clouds.length > 0 ? report.clouds.map(c => c.description).join(', ') : undefined}
        />
        <FieldRow
          label="Temperature"
          value={reading ? formatTemperature(reading.temperature, temperatureUnit) : undefined}
        />
        <FieldRow
          label="Dewpoint"
          value={reading?.dewpoint ? formatTemperature(reading.dewpoint, temperatureUnit) : undefined}
        />
        <FieldRow
          label="Pressure"
          value={report.pressure ? formatPressure(report.pressure.hundredthsInHg) : undefined}
        />
      </div>

      <div style={{ marginTop: '16px', paddingTop: '12px', borderTop: '1px solid #444' }}>
        <strong style={{ color: '#4A9EFF' }}>Raw METAR:</strong>
        <pre style={{
          marginTop: '8px',
          padding: '12px',
          backgroundColor: 'rgba(0, 0, 0, 0.3)',
          borderRadius: '4px',
          fontSize: '12px',
          fontFamily: 'monospace',
          whiteSpace: 'pre-wrap',
          color: '#cccccc'
        }}>
          {report.raw}
        </pre>
      </div>
    </div>
  );
}
