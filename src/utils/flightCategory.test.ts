import { describe, expect, it } from 'vitest';
import { FlightCategory } from '../types/flightCategory';
import { parseCloudLayer } from './cloudParser';
import { findCeilingFt, parseFlightCategory } from './flightCategory';
import { parseVisibility } from './visibilityParser';
import type { CloudLayer } from '../types/metar';

function layers(...tokens: string[]): CloudLayer[] {
  return tokens.map(token => {
    const layer = parseCloudLayer(token);
    if (!layer) throw new Error(`not a cloud layer: ${token}`);
    return layer;
  });
}

describe('flightCategory', () => {
  describe('findCeilingFt', () => {
    it('uses the lowest broken, overcast or obscured layer', () => {
      expect(findCeilingFt(layers('FEW005', 'BKN030', 'OVC010'))).toBe(1000);
      expect(findCeilingFt(layers('VV002'))).toBe(200);
    });

    it('has no ceiling without one of those layers', () => {
      expect(findCeilingFt(layers('CLR'))).toBe(Infinity);
      expect(findCeilingFt(layers('FEW010', 'SCT020'))).toBe(Infinity);
      expect(findCeilingFt([])).toBeUndefined();
    });
  });

  describe('parseFlightCategory', () => {
    it('categorizes by visibility alone', () => {
      expect(parseFlightCategory(parseVisibility('1/2SM'), [])).toBe(FlightCategory.LIFR);
      expect(parseFlightCategory(parseVisibility('1SM'), [])).toBe(FlightCategory.IFR);
      expect(parseFlightCategory(parseVisibility('3SM'), [])).toBe(FlightCategory.MVFR);
      expect(parseFlightCategory(parseVisibility('5SM'), [])).toBe(FlightCategory.VFR);
    });

    it('categorizes by ceiling alone', () => {
      expect(parseFlightCategory(undefined, layers('OVC004'))).toBe(FlightCategory.LIFR);
      expect(parseFlightCategory(undefined, layers('BKN005'))).toBe(FlightCategory.IFR);
      expect(parseFlightCategory(undefined, layers('BKN010'))).toBe(FlightCategory.MVFR);
      expect(parseFlightCategory(undefined, layers('OVC030'))).toBe(FlightCategory.VFR);
    });

    it('takes the more restrictive of the two', () => {
      expect(parseFlightCategory(parseVisibility('10SM'), layers('OVC008'))).toBe(FlightCategory.IFR);
      expect(parseFlightCategory(parseVisibility('2SM'), layers('CLR'))).toBe(FlightCategory.IFR);
      expect(parseFlightCategory(parseVisibility('M1/4SM'), layers('BKN020'))).toBe(FlightCategory.LIFR);
    });

    it('is unknown with nothing to go on', () => {
      expect(parseFlightCategory(undefined, [])).toBe(FlightCategory.UNKNOWN);
    });
  });
});
