/**
 * Price Series Types
 */

/**
 * One historical price sample (close price of the period starting at `timestamp`)
 */
export interface PricePoint {
  timestamp: Date;
  price: number;
}
