import { FlowerSize, ReservationRequest, StockRecord, FLOWER_SIZES } from '../types/flower.types';
import { AppError, ErrorCode } from '../types/error.types';

const cellKey = (species: string, size: FlowerSize): string => `${species}:${size}`;

/**
 * Inventory
 *
 * Available flower counts per (species, size), kept in a single lookup table.
 * Every cell is created up front from the stock records; reading an unknown
 * cell returns 0 and never creates it.
 *
 * Counts never go negative: reserving more than is available throws
 * INVENTORY_UNDERFLOW, callers are expected to check first.
 */
export class Inventory {
  private readonly available = new Map<string, number>();
  private readonly initial = new Map<string, number>();
  private readonly speciesOrder: string[] = [];

  constructor(records: readonly StockRecord[]) {
    for (const record of records) {
      if (!Number.isSafeInteger(record.quantity) || record.quantity < 0) {
        throw new AppError(
          ErrorCode.INVALID_INPUT,
          `Stock quantity for ${record.species}${record.size} must be a non-negative integer`,
          400,
          { species: record.species, size: record.size, quantity: record.quantity }
        );
      }

      if (!this.speciesOrder.includes(record.species)) {
        this.speciesOrder.push(record.species);
        for (const size of FLOWER_SIZES) {
          this.available.set(cellKey(record.species, size), 0);
        }
      }

      const key = cellKey(record.species, record.size);
      const quantity = (this.available.get(key) ?? 0) + record.quantity;
      if (!Number.isSafeInteger(quantity)) {
        throw new AppError(
          ErrorCode.INVALID_INPUT,
          `Stock of ${record.species}${record.size} is too large`,
          400,
          { species: record.species, size: record.size }
        );
      }
      this.available.set(key, quantity);
    }

    for (const size of FLOWER_SIZES) {
      if (!Number.isSafeInteger(this.totalBySize(size))) {
        throw new AppError(ErrorCode.INVALID_INPUT, `Total stock of size ${size} is too large`, 400, {
          size,
        });
      }
    }

    for (const [key, quantity] of this.available) {
      this.initial.set(key, quantity);
    }
  }

  /**
   * Species in the order they first appeared in the stock records
   */
  species(): readonly string[] {
    return this.speciesOrder;
  }

  getAvailable(species: string, size: FlowerSize): number {
    return this.available.get(cellKey(species, size)) ?? 0;
  }

  getInitial(species: string, size: FlowerSize): number {
    return this.initial.get(cellKey(species, size)) ?? 0;
  }

  /**
   * Total stock of one size class across all species
   */
  totalBySize(size: FlowerSize): number {
    return this.speciesOrder.reduce((sum, species) => sum + this.getAvailable(species, size), 0);
  }

  canReserve(species: string, size: FlowerSize, quantity: number): boolean {
    return this.getAvailable(species, size) >= quantity;
  }

  reserve(species: string, size: FlowerSize, quantity: number): void {
    assertQuantity(quantity);

    const available = this.getAvailable(species, size);
    if (available < quantity) {
      throw new AppError(
        ErrorCode.INVENTORY_UNDERFLOW,
        `Cannot reserve ${quantity} of ${species}${size}. Only ${available} available.`,
        500,
        { species, size, requested: quantity, available }
      );
    }

    this.available.set(cellKey(species, size), available - quantity);
  }

  release(species: string, size: FlowerSize, quantity: number): void {
    assertQuantity(quantity);

    const key = cellKey(species, size);
    const current = this.available.get(key);
    if (current === undefined) {
      throw new AppError(
        ErrorCode.ALLOCATION_INVARIANT_VIOLATION,
        `Cannot release ${species}${size}: not part of this inventory`,
        500,
        { species, size, quantity }
      );
    }

    this.available.set(key, current + quantity);
  }

  /**
   * Reserve every request or none of them
   *
   * Demand is aggregated per cell before anything is decremented, so several
   * requests against the same cell are checked together.
   *
   * @returns false (and leaves the inventory untouched) if any cell is short
   */
  reserveAll(requests: readonly ReservationRequest[]): boolean {
    const demand = new Map<string, ReservationRequest>();
    for (const request of requests) {
      assertQuantity(request.quantity);
      const key = cellKey(request.species, request.size);
      const existing = demand.get(key);
      demand.set(key, { ...request, quantity: (existing?.quantity ?? 0) + request.quantity });
    }

    for (const request of demand.values()) {
      if (!this.canReserve(request.species, request.size, request.quantity)) {
        return false;
      }
    }

    for (const request of demand.values()) {
      this.reserve(request.species, request.size, request.quantity);
    }

    return true;
  }

  /**
   * Every cell, in species order then size order
   */
  snapshot(): StockRecord[] {
    return this.speciesOrder.flatMap((species) =>
      FLOWER_SIZES.map((size) => ({ species, size, quantity: this.getAvailable(species, size) }))
    );
  }
}

function assertQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity < 0) {
    throw new AppError(
      ErrorCode.ALLOCATION_INVARIANT_VIOLATION,
      `Reservation quantity must be a non-negative integer, got ${quantity}`,
      500
    );
  }
}
