export default function LoadingSpinner({ stationId }: { stationId?: string }) {
  return (
    <div style={{
      padding: '24px 0',
      color: '#ffffff',
      fontSize: '18px',
      fontFamily: 'Arial, sans-serif'
    }}>
      {stationId ? `Fetching METAR for ${stationId}...` : 'Fetching METAR...'}
    </div>
  );
}
