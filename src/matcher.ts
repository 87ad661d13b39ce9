import { log } from './logger.js';
import type { Listing } from './types.js';
import type { FilterCriteria } from './config.js';
import { defaultExtractors, type NumericExtractors } from './numeric.js';

export type FilterVerdict = { passed: true } | { passed: false; reason: string };

interface NumericRule {
  field: keyof NumericExtractors;
  min: number | undefined;
  max: number | undefined;
}

function numericRules(criteria: FilterCriteria): NumericRule[] {
  return [
    { field: 'rooms', min: criteria.minRooms, max: criteria.maxRooms },
    { field: 'size', min: criteria.minSize, max: criteria.maxSize },
    { field: 'price', min: criteria.minPrice, max: criteria.maxPrice },
  ];
}

/**
 * Exclusion is checked first and is a hard veto; then the include list; then
 * numeric bounds, each of which is skipped when the text carries no value for it.
 */
export function evaluateListing(
  listing: Listing,
  criteria: FilterCriteria,
  extractors: NumericExtractors = defaultExtractors,
): FilterVerdict {
  const text = listing.text.toLowerCase();

  const excluded = criteria.excludeKeywords.find((kw) => text.includes(kw.toLowerCase()));
  if (excluded !== undefined) {
    return { passed: false, reason: `excluded keyword "${excluded}"` };
  }

  if (
    criteria.includeKeywords.length > 0 &&
    !criteria.includeKeywords.some((kw) => text.includes(kw.toLowerCase()))
  ) {
    return { passed: false, reason: 'no include keyword present' };
  }

  for (const rule of numericRules(criteria)) {
    if (rule.min === undefined && rule.max === undefined) continue;
    const value = extractors[rule.field](listing.text);
    if (value === null) continue;
    if (rule.min !== undefined && value < rule.min) {
      return { passed: false, reason: `${rule.field} ${value} below minimum ${rule.min}` };
    }
    if (rule.max !== undefined && value > rule.max) {
      return { passed: false, reason: `${rule.field} ${value} above maximum ${rule.max}` };
    }
  }

  return { passed: true };
}

export function passesFilters(
  listing: Listing,
  criteria: FilterCriteria,
  extractors?: NumericExtractors,
): boolean {
  return evaluateListing(listing, criteria, extractors).passed;
}

export function filterListings(
  listings: Listing[],
  criteria: FilterCriteria,
  extractors?: NumericExtractors,
): Listing[] {
  const passed: Listing[] = [];
  let rejected = 0;

  for (const listing of listings) {
    const verdict = evaluateListing(listing, criteria, extractors);
    if (verdict.passed) {
      passed.push(listing);
    } else {
      log.debug(`Filtered out ${listing.url} — ${verdict.reason}`);
      rejected++;
    }
  }

  log.info(`Filtering: ${rejected} listings rejected, ${passed.length} remaining`);
  return passed;
}
