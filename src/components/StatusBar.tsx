import { FlightCategory, FlightCategoryColors, FlightCategoryCriteria, FlightCategoryLabels } from '../types/flightCategory';

interface StatusBarProps {
  lastUpdate: Date | null;
  isRefreshing: boolean;
  stationId: string | null;
  autoRefreshEnabled: boolean;
  onAutoRefreshChange: (enabled: boolean) => void;
}

const LEGEND_CATEGORIES = [FlightCategory.VFR, FlightCategory.MVFR, FlightCategory.IFR, FlightCategory.LIFR];

const LegendDot = ({ color, label, title }: { color: string; label: string; title: string }) => {
  return (
    <div style={{ display: 'flex', alignItems: 'center', gap: '8px' }} title={title}>
      <div
        style={{
          width: '8px',
          height: '8px',
          borderRadius: '50%',
          backgroundColor: color,
          border: `0.5px solid ${color}`,
          filter: `drop-shadow(0 0 2px ${color}) drop-shadow(0 0 4px ${color}) drop-shadow(0 0 6px ${color})`,
          position: 'relative'
        }}
      >
        {/* Bright center core */}
        <div
          style={{
            position: 'absolute',
            top: '50%',
            left: '50%',
            transform: 'translate(-50%, -50%)',
            width: '4px',
            height: '4px',
            borderRadius: '50%',
            backgroundColor: '#ffffff',
            filter: 'drop-shadow(0 0 1px rgba(255, 255, 255, 0.9)) drop-shadow(0 0 2px rgba(255, 255, 255, 0.6))'
          }}
        />
      </div>
      <span>{label}</span>
    </div>
  );
};

export default function StatusBar({ lastUpdate, isRefreshing, stationId, autoRefreshEnabled, onAutoRefreshChange }: StatusBarProps) {
  return (
    <div style={{
      position: 'fixed',
      bottom: 0,
      left: 0,
      right: 0,
      backgroundColor: 'rgba(0, 0, 0, 0.8)',
      color: '#ffffff',
      padding: '10px 20px',
      zIndex: 1000,
      fontFamily: 'Arial, sans-serif',
      fontSize: '14px',
      display: 'flex',
      justifyContent: 'space-between',
      alignItems: 'center'
    }}>
      <div>
        {isRefreshing ? (
          <span>Refreshing {stationId ?? 'report'}...</span>
        ) : (
          <span>
            Last updated: {lastUpdate ? lastUpdate.toLocaleTimeString() : 'Never'}
          </span>
        )}
      </div>
      <div style={{ display: 'flex', gap: '20px', alignItems: 'center' }}>
        <div style={{ display: 'flex', gap: '20px', alignItems: 'center' }}>
          {LEGEND_CATEGORIES.map(category => (
            <LegendDot
              key={category}
              color={FlightCategoryColors[category]}
              label={FlightCategoryLabels[category]}
              title={FlightCategoryCriteria[category]}
            />
          ))}
        </div>
        <div style={{ display: 'flex', gap: '10px', alignItems: 'center', marginLeft: '20px', paddingLeft: '20px', borderLeft: '1px solid #444' }}>
          <label style={{ display: 'flex', alignItems: 'center', gap: '8px', cursor: 'pointer', fontSize: '12px' }}>
            <input
              type="checkbox"
              checked={autoRefreshEnabled}
              onChange={(e) => onAutoRefreshChange(e.target.checked)}
              style={{
                width: '16px',
                height: '16px',
                cursor: 'pointer',
                accentColor: '#4CAF50'
              }}
            />
            <span style={{ color: '#cccccc' }}>Auto Refresh</span>
          </label>
        </div>
      </div>
    </div>
  );
}
