import { describe, expect, it } from 'vitest';
import { validateStationInput } from './stationInput';

describe('validateStationInput', () => {
  it('normalizes case and whitespace', () => {
    expect(validateStationInput(' khio ')).toEqual({ ok: true, stationId: 'KHIO' });
    expect(validateStationInput('K0S9')).toEqual({ ok: true, stationId: 'K0S9' });
  });

  it('requires a code', () => {
    expect(validateStationInput('   ')).toEqual({ ok: false, message: 'Please enter an airport code' });
  });

  it('requires exactly four characters', () => {
    expect(validateStationInput('HIO')).toEqual({ ok: false, message: 'Airport code must be 4 characters (e.g., KHIO)' });
    expect(validateStationInput('KHIOX')).toEqual({ ok: false, message: 'Airport code must be 4 characters (e.g., KHIO)' });
  });

  it('allows only letters and digits', () => {
    expect(validateStationInput('KH-O')).toEqual({ ok: false, message: 'Airport code may only contain letters and digits' });
  });
});
