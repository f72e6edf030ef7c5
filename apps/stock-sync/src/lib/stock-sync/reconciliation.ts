/**
 * Reconciliation
 *
 * Turns the inventory snapshot and a channel's offer ids into stock and price
 * updates. Every offer id listed on the channel gets exactly one stock update:
 * its bucketed quantity when the snapshot has it, zero otherwise.
 */

import type { InventoryRecord, PriceUpdate, StockUpdate } from './stock-sync.types';

/** Quantity sent for the ">10" sentinel */
export const MANY_IN_STOCK_QUANTITY = 100;

const MANY_IN_STOCK_DESCRIPTOR = '>10';

/** A single remaining unit is held back rather than listed */
const SINGLE_UNIT_DESCRIPTOR = '1';

/**
 * Error thrown for a quantity descriptor that is neither a count nor a sentinel
 */
export class QuantityParseError extends Error {
  constructor(
    public readonly identifier: string,
    public readonly descriptor: string
  ) {
    super(`Invalid quantity "${descriptor}" for ${identifier}`);
    this.name = 'QuantityParseError';
  }
}

/**
 * Error thrown when a price has no digits before the decimal separator
 */
export class PriceParseError extends Error {
  constructor(
    public readonly identifier: string,
    public readonly priceText: string
  ) {
    super(`Invalid price "${priceText}" for ${identifier}`);
    this.name = 'PriceParseError';
  }
}

/**
 * Map a quantity descriptor onto the quantity listed on the marketplace
 *
 * @throws QuantityParseError for empty or non-numeric descriptors
 */
export function bucketQuantity(descriptor: string, identifier = ''): number {
  const value = descriptor.trim();

  if (value === MANY_IN_STOCK_DESCRIPTOR) {
    return MANY_IN_STOCK_QUANTITY;
  }
  if (value === SINGLE_UNIT_DESCRIPTOR) {
    return 0;
  }
  if (!/^\d+$/.test(value)) {
    throw new QuantityParseError(identifier, descriptor);
  }

  return parseInt(value, 10);
}

/**
 * Reduce a price text to the digits of its integer part
 *
 * Everything from the first "." on is dropped; a text without "." is taken
 * whole. Returns '' when no digit precedes the separator.
 *
 * @example normalizePriceText("5'990.00 руб.") // '5990'
 */
export function normalizePriceText(priceText: string): string {
  const [integerPart] = priceText.split('.');
  return integerPart.replace(/[^0-9]/g, '');
}

/**
 * Current time as the marketplaces expect it: UTC, no milliseconds
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Build one stock update per known offer id
 *
 * Phases: copy the known ids into a pending set, match snapshot records
 * against it (each id is emitted once, first record wins), then emit zero for
 * every id still pending, in the known set's order. `knownIds` is not modified.
 */
export function buildStockUpdates(
  records: Iterable<InventoryRecord>,
  knownIds: ReadonlySet<string>,
  warehouseId: string | null,
  now: Date = new Date()
): StockUpdate[] {
  const timestamp = formatTimestamp(now);
  const pending = new Set(knownIds);
  const stocks: StockUpdate[] = [];

  for (const record of records) {
    if (!pending.has(record.identifier)) {
      continue;
    }
    stocks.push({
      identifier: record.identifier,
      quantity: bucketQuantity(record.quantityDescriptor, record.identifier),
      timestamp,
      warehouseId,
    });
    pending.delete(record.identifier);
  }

  for (const identifier of pending) {
    stocks.push({ identifier, quantity: 0, timestamp, warehouseId });
  }

  return stocks;
}

/**
 * Build price updates for the known offer ids present in the snapshot
 *
 * Ids missing from the snapshot keep their current marketplace price.
 *
 * @throws PriceParseError when a matched record's price normalizes to ''
 */
export function buildPriceUpdates(
  records: Iterable<InventoryRecord>,
  knownIds: ReadonlySet<string>,
  currencyCode: string
): PriceUpdate[] {
  const priced = new Set<string>();
  const prices: PriceUpdate[] = [];

  for (const record of records) {
    if (!knownIds.has(record.identifier) || priced.has(record.identifier)) {
      continue;
    }
    const digits = normalizePriceText(record.priceText);
    if (!digits) {
      throw new PriceParseError(record.identifier, record.priceText);
    }
    prices.push({ identifier: record.identifier, price: parseInt(digits, 10), currencyCode });
    priced.add(record.identifier);
  }

  return prices;
}

/**
 * Stock updates with a non-zero quantity
 */
export function filterInStock(stocks: StockUpdate[]): StockUpdate[] {
  return stocks.filter((stock) => stock.quantity !== 0);
}
