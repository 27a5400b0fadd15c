import type { CloudCode, CloudCoverage, CloudLayer, ConvectiveCloud } from '../types/metar';

// Capture groups: [1] CLR|SKC, or [2] coverage [3] height in hundreds of feet [4] CB|TCU
const CLOUD_REGEX = /^(?:(CLR|SKC)|(FEW|SCT|BKN|OVC|VV)(\d{3})(CB|TCU)?)$/;

const COVERAGE: Record<CloudCode, CloudCoverage> = {
  CLR: 'clear',    // Clear below 12,000 ft (automated stations)
  SKC: 'clear',    // Sky clear
  FEW: 'few',      // 1-2 oktas
  SCT: 'scattered', // 3-4 oktas
  BKN: 'broken',   // 5-7 oktas
  OVC: 'overcast', // 8 oktas
  VV: 'obscured'   // Vertical visibility into an obscured sky
};

const LAYER_LABELS: Record<CloudCode, string> = {
  CLR: 'clear skies',
  SKC: 'sky clear',
  FEW: 'few clouds',
  SCT: 'scattered clouds',
  BKN: 'broken clouds',
  OVC: 'overcast',
  VV: 'sky obscured'
};

const CONVECTIVE: Record<'CB' | 'TCU', ConvectiveCloud> = {
  CB: 'cumulonimbus',
  TCU: 'towering cumulus'
};

function isLayerCode(code: string): code is Exclude<CloudCode, 'CLR' | 'SKC'> {
  return code === 'FEW' || code === 'SCT' || code === 'BKN' || code === 'OVC' || code === 'VV';
}

export function describeCloudLayer(code: CloudCode, baseFt?: number, convective?: ConvectiveCloud): string {
  let text = LAYER_LABELS[code];
  if (baseFt !== undefined) {
    text += code === 'VV' ? `, vertical visibility ${baseFt} feet` : ` at ${baseFt} feet`;
  }
  if (convective) {
    text += ` (${convective})`;
  }
  return text;
}

/**
 * Decodes a sky condition group: `CLR`, `SKC`, `BKN025`, `OVC008CB`, `VV003`.
 * Heights are given in hundreds of feet and returned in feet.
 */
export function parseCloudLayer(token: string): CloudLayer | undefined {
  const match = token.match(CLOUD_REGEX);
  if (!match) {
    return undefined;
  }

  const clear = match[1];
  if (clear === 'CLR' || clear === 'SKC') {
    return { code: clear, coverage: COVERAGE[clear], description: describeCloudLayer(clear) };
  }

  const code = match[2];
  if (!isLayerCode(code)) {
    return undefined;
  }
  const baseFt = parseInt(match[3], 10) * 100;
  const suffix = match[4];
  const convective = suffix === 'CB' || suffix === 'TCU' ? CONVECTIVE[suffix] : undefined;

  return {
    code,
    coverage: COVERAGE[code],
    baseFt,
    convective,
    description: describeCloudLayer(code, baseFt, convective)
  };
}
