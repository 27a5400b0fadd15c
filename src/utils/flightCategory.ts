import { FlightCategory, FlightCategoryRank } from '../types/flightCategory';
import type { CloudLayer, Visibility } from '../types/metar';

/**
 * Ceiling from decoded cloud layers, in feet AGL.
 * Only BKN, OVC and VV count as a ceiling. CLR/SKC, or only FEW/SCT layers,
 * mean no ceiling restriction (Infinity). No layers at all gives undefined.
 */
export function findCeilingFt(clouds: readonly CloudLayer[]): number | undefined {
  if (clouds.length === 0) {
    return undefined;
  }

  const ceilings = clouds
    .filter(layer => layer.code === 'BKN' || layer.code === 'OVC' || layer.code === 'VV')
    .map(layer => layer.baseFt ?? Infinity);

  return ceilings.length > 0 ? Math.min(...ceilings) : Infinity;
}

function categoryForVisibility(visibilityMi: number): FlightCategory {
  if (visibilityMi < 1) {
    return FlightCategory.LIFR;
  } else if (visibilityMi < 3) {
    return FlightCategory.IFR;
  } else if (visibilityMi < 5) {
    return FlightCategory.MVFR;
  }
  return FlightCategory.VFR; // >= 5 SM
}

function categoryForCeiling(ceilingFt: number): FlightCategory {
  if (ceilingFt < 500) {
    return FlightCategory.LIFR;
  } else if (ceilingFt < 1000) {
    return FlightCategory.IFR;
  } else if (ceilingFt < 3000) {
    return FlightCategory.MVFR;
  }
  return FlightCategory.VFR; // >= 3000 ft
}

/**
 * Determines the flight category from decoded visibility and sky condition:
 * - LIFR: Ceiling < 500 ft AGL and/or visibility < 1 mile
 * - IFR: Ceiling 500 to < 1000 ft AGL and/or visibility 1 to < 3 miles
 * - MVFR: Ceiling 1000 to < 3000 ft AGL and/or visibility 3 to < 5 miles
 * - VFR: Ceiling >= 3000 ft AGL and visibility >= 5 miles
 *
 * When both are known the more restrictive one wins.
 */
export function parseFlightCategory(
  visibility: Visibility | undefined,
  clouds: readonly CloudLayer[]
): FlightCategory {
  const ceilingFt = findCeilingFt(clouds);

  if (visibility !== undefined && ceilingFt !== undefined) {
    const visCategory = categoryForVisibility(visibility.statuteMiles);
    const ceilCategory = categoryForCeiling(ceilingFt);
    return FlightCategoryRank[visCategory] < FlightCategoryRank[ceilCategory] ? visCategory : ceilCategory;
  }

  if (visibility !== undefined) {
    return categoryForVisibility(visibility.statuteMiles);
  }

  if (ceilingFt !== undefined) {
    return categoryForCeiling(ceilingFt);
  }

  return FlightCategory.UNKNOWN;
}
