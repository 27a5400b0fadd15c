export enum FlightCategory {
  VFR = 'VFR',
  MVFR = 'MVFR',
  IFR = 'IFR',
  LIFR = 'LIFR',
  UNKNOWN = 'UNKNOWN'
}

export const FlightCategoryColors: Record<FlightCategory, string> = {
  [FlightCategory.VFR]: '#00FF00',    // Green
  [FlightCategory.MVFR]: '#0080FF',   // Blue
  [FlightCategory.IFR]: '#FF0000',    // Red
  [FlightCategory.LIFR]: '#FF00FF',   // Magenta
  [FlightCategory.UNKNOWN]: '#808080' // Gray
};

export const FlightCategoryLabels: Record<FlightCategory, string> = {
  [FlightCategory.VFR]: 'VFR',
  [FlightCategory.MVFR]: 'MVFR',
  [FlightCategory.IFR]: 'IFR',
  [FlightCategory.LIFR]: 'LIFR',
  [FlightCategory.UNKNOWN]: 'Unknown'
};

export const FlightCategoryCriteria: Record<FlightCategory, string> = {
  [FlightCategory.VFR]: 'Ceiling 3000 ft or higher and visibility 5 SM or more',
  [FlightCategory.MVFR]: 'Ceiling 1000 to 3000 ft and/or visibility 3 to 5 SM',
  [FlightCategory.IFR]: 'Ceiling 500 to 1000 ft and/or visibility 1 to 3 SM',
  [FlightCategory.LIFR]: 'Ceiling below 500 ft and/or visibility below 1 SM',
  [FlightCategory.UNKNOWN]: 'Not enough data reported'
};

// Lower is more restrictive
export const FlightCategoryRank: Record<FlightCategory, number> = {
  [FlightCategory.LIFR]: 0,
  [FlightCategory.IFR]: 1,
  [FlightCategory.MVFR]: 2,
  [FlightCategory.VFR]: 3,
  [FlightCategory.UNKNOWN]: 4
};
