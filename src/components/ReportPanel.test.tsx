// @vitest-environment jsdom
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { DecodedReport } from '../types/metar';
import { decodeMetar } from '../utils/metarParser';
import ReportPanel from './ReportPanel';

function decodeOk(raw: string, hint: string): DecodedReport {
  const result = decodeMetar(raw, hint);
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  return result.report;
}

const KHIO_RAW = 'KHIO 051953Z 36008KT 10SM CLR 21/M01 A3012';

describe('ReportPanel', () => {
  afterEach(() => {
    cleanup();
  });

  it('shows every decoded field', () => {
    render(
      <ReportPanel
        report={decodeOk(KHIO_RAW, 'KHIO')}
        stationName="Portland/Hillsboro"
        temperatureUnit="F"
        onTemperatureUnitChange={() => {}}
      />
    );

    expect(screen.getByText('KHIO')).toBeTruthy();
    expect(screen.getByText('Portland/Hillsboro')).toBeTruthy();
    expect(screen.getByText('VFR')).toBeTruthy();
    expect(screen.getByText('clear skies, 70°F (21°C), Wind from the north at 8 knots')).toBeTruthy();
    expect(screen.getByText('Observed at 19:53Z on day 05')).toBeTruthy();
    expect(screen.getByText('Wind from the north at 8 knots')).toBeTruthy();
    expect(screen.getByText('10+ miles visibility')).toBeTruthy();
    expect(screen.getByText('None')).toBeTruthy();
    expect(screen.getByText('clear skies')).toBeTruthy();
    expect(screen.getByText('70°F (21°C)')).toBeTruthy();
    expect(screen.getByText('30°F (-1°C)')).toBeTruthy();
    expect(screen.getByText('30.12 inHg')).toBeTruthy();
    expect(screen.getByText(KHIO_RAW)).toBeTruthy();
    expect(screen.queryByText('Refresh')).toBeNull();
  });

  it('shows temperatures in Celsius first when selected', () => {
    render(
      <ReportPanel report={decodeOk(KHIO_RAW, 'KHIO')} temperatureUnit="C" onTemperatureUnitChange={() => {}} />
    );

    expect(screen.getByText('21°C (70°F)')).toBeTruthy();
    expect(screen.getByTitle('Switch to Fahrenheit')).toBeTruthy();
  });

  it('toggles the temperature unit', () => {
    const onTemperatureUnitChange = vi.fn();
    render(
      <ReportPanel report={decodeOk(KHIO_RAW, 'KHIO')} temperatureUnit="F" onTemperatureUnitChange={onTemperatureUnitChange} />
    );

    fireEvent.click(screen.getByTitle('Switch to Celsius'));

    expect(onTemperatureUnitChange).toHaveBeenCalledWith('C');
  });

  it('marks fields the report left out', () => {
    render(
      <ReportPanel
        report={decodeOk('KHIO 061853Z INVALIDWIND INVALIDVIS', 'KHIO')}
        temperatureUnit="F"
        onTemperatureUnitChange={() => {}}
      />
    );

    expect(screen.getAllByText('Not reported')).toHaveLength(5);
    expect(screen.getByText('visibility unknown')).toBeTruthy();
    expect(screen.getByText('Unknown')).toBeTruthy();
    expect(screen.getByText('Weather conditions available')).toBeTruthy();
  });

  it('warns when the report is for another station', () => {
    render(
      <ReportPanel
        report={decodeOk('KPDX 051953Z 36008KT 10SM CLR 21/M01 A3012', 'KHIO')}
        temperatureUnit="F"
        onTemperatureUnitChange={() => {}}
      />
    );

    expect(screen.getByText('Report is for KPDX, requested KHIO')).toBeTruthy();
  });

  it('offers a refresh when given a handler', () => {
    const onRefresh = vi.fn();
    render(
      <ReportPanel
        report={decodeOk(KHIO_RAW, 'KHIO')}
        temperatureUnit="F"
        onTemperatureUnitChange={() => {}}
        onRefresh={onRefresh}
      />
    );

    fireEvent.click(screen.getByText('Refresh'));

    expect(onRefresh).toHaveBeenCalledTimes(1);
  });
});
