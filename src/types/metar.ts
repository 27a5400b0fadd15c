import type { FlightCategory } from './flightCategory';

/**
 * One observation as returned by the Aviation Weather Center JSON API.
 * Only the fields the app reads are listed.
 */
export interface METAR {
  icaoId?: string;
  rawOb?: string;  // API uses rawOb for raw text
  rawText?: string;  // Some mirrors use rawText
  reportTime?: string;
  obsTime?: number;
  name?: string;
  lat?: number;
  lon?: number;
}

export type CompassPoint =
  | 'N' | 'NNE' | 'NE' | 'ENE'
  | 'E' | 'ESE' | 'SE' | 'SSE'
  | 'S' | 'SSW' | 'SW' | 'WSW'
  | 'W' | 'WNW' | 'NW' | 'NNW';

export type WindDirection =
  | { readonly kind: 'degrees'; readonly degrees: number; readonly compass: CompassPoint }
  | { readonly kind: 'variable' }
  | { readonly kind: 'calm' };

export interface WindVariation {
  readonly fromDegrees: number;
  readonly toDegrees: number;
}

export interface WindInfo {
  readonly direction: WindDirection;
  readonly speedKt: number;
  readonly gustKt?: number;
  readonly variation?: WindVariation;
  readonly description: string;
}

export interface Visibility {
  readonly statuteMiles: number;
  /** Reported as 10 SM or more; 10SM is the top of the reporting range, not an exact reading */
  readonly isMaximum: boolean;
  readonly isLessThan: boolean;
  /** Value as written in the report, e.g. `1 1/2` */
  readonly text: string;
  readonly description: string;
}

export type WeatherIntensity = 'light' | 'moderate' | 'heavy';

export type WeatherDescriptor = 'SH' | 'TS' | 'FZ' | 'BL' | 'DR' | 'MI' | 'BC' | 'PR';

export interface PhenomenonCode {
  readonly code: string;
  readonly label: string;
}

export interface WeatherPhenomenon {
  readonly raw: string;
  readonly intensity: WeatherIntensity;
  readonly vicinity: boolean;
  readonly descriptor?: WeatherDescriptor;
  readonly phenomena: readonly PhenomenonCode[];
  readonly description: string;
}

export type CloudCode = 'CLR' | 'SKC' | 'FEW' | 'SCT' | 'BKN' | 'OVC' | 'VV';

export type CloudCoverage = 'clear' | 'few' | 'scattered' | 'broken' | 'overcast' | 'obscured';

export type ConvectiveCloud = 'cumulonimbus' | 'towering cumulus';

export interface CloudLayer {
  readonly code: CloudCode;
  readonly coverage: CloudCoverage;
  /** Feet AGL. For VV this is the height of the obscuration, not a cloud base */
  readonly baseFt?: number;
  readonly convective?: ConvectiveCloud;
  readonly description: string;
}

export interface Temperature {
  readonly celsius: number;
  readonly fahrenheit: number;
}

export interface TemperatureReading {
  readonly temperature: Temperature;
  readonly dewpoint?: Temperature;
  readonly description: string;
  readonly dewpointDescription?: string;
}

export interface Pressure {
  /** Fixed-point source value, e.g. 3012 for A3012 */
  readonly hundredthsInHg: number;
  readonly inHg: number;
  readonly description: string;
}

export interface ObservationTime {
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly description: string;
}

export type ReportModifier = 'AUTO' | 'COR';

export interface DecodedReport {
  readonly station: string;
  readonly stationHint: string;
  readonly matchesHint: boolean;
  readonly observed: ObservationTime;
  readonly modifier?: ReportModifier;
  readonly wind?: WindInfo;
  readonly visibility?: Visibility;
  readonly visibilityDescription: string;
  readonly weather: readonly WeatherPhenomenon[];
  readonly clouds: readonly CloudLayer[];
  readonly temperature?: TemperatureReading;
  readonly pressure?: Pressure;
  readonly flightCategory: FlightCategory;
  readonly summary: string;
  readonly raw: string;
}

export type DecodeErrorKind = 'MalformedReport' | 'InvalidStationId' | 'InvalidTimestamp';

export interface DecodeError {
  readonly kind: DecodeErrorKind;
  readonly message: string;
  /** Offending token, when there is one */
  readonly token?: string;
}

export type DecodeResult =
  | { readonly ok: true; readonly report: DecodedReport }
  | { readonly ok: false; readonly error: DecodeError };
