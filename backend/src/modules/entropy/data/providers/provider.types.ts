/**
 * Historical price source contract.
 */

import type { DateRange, PricePoint } from '../../entropy.types.js';

export interface PriceSourceProvider {
  readonly name: string;
  /**
   * Daily adjusted closes within the range (inclusive), ascending by date.
   * Throws DataUnavailableError when the source has nothing for the ticker.
   */
  fetchDaily(ticker: string, range: DateRange): Promise<PricePoint[]>;
}
