import { type FormEvent, useState } from 'react';
import { validateStationInput } from '../utils/stationInput';

interface StationFormProps {
  initialStation?: string;
  isLoading: boolean;
  onSubmit: (stationId: string) => void;
}

export default function StationForm({ initialStation = '', isLoading, onSubmit }: StationFormProps) {
  const [inputIcao, setInputIcao] = useState(initialStation);
  const [validationError, setValidationError] = useState<string | null>(null);

  const handleSubmit = (e: FormEvent<HTMLFormElement>) => {
    e.preventDefault();
    const result = validateStationInput(inputIcao);
    if (!result.ok) {
      setValidationError(result.message);
      return;
    }
    setValidationError(null);
    setInputIcao(result.stationId);
    onSubmit(result.stationId);
  };

  return (
    <form onSubmit={handleSubmit} style={{ marginBottom: '16px', fontFamily: 'Arial, sans-serif' }}>
      <div style={{ display: 'flex', gap: '8px', alignItems: 'center' }}>
        <label htmlFor="station-input" style={{ color: '#cccccc', fontSize: '14px' }}>Airport code</label>
        <input
          id="station-input"
          type="text"
          value={inputIcao}
          onChange={(e) => setInputIcao(e.target.value)}
          placeholder="KHIO"
          maxLength={8}
          autoFocus
          style={{
            backgroundColor: '#333',
            color: '#fff',
            border: '1px solid #555',
            borderRadius: '4px',
            fontSize: '14px',
            padding: '6px 8px',
            width: '90px',
            textTransform: 'uppercase',
            outline: 'none'
          }}
        />
        <button
          type="submit"
          disabled={isLoading}
          style={{
            backgroundColor: '#4CAF50',
            color: '#ffffff',
            border: 'none',
            borderRadius: '4px',
            cursor: isLoading ? 'wait' : 'pointer',
            fontSize: '14px',
            padding: '6px 12px'
          }}
        >
          Get METAR
        </button>
      </div>
      {validationError && (
        <div role="alert" style={{ fontSize: '13px', color: '#ff4444', marginTop: '8px' }}>{validationError}</div>
      )}
    </form>
  );
}
