import { Bouquet } from './bouquet';
import { Inventory } from './inventory';
import { rankBouquets } from './priority-ranker';
import { DeactivationReason } from '../types/bouquet.types';
import { FLOWER_SIZES, ReservationRequest } from '../types/flower.types';
import { AppError, ErrorCode } from '../types/error.types';
import { logger } from '../config/logger';

export interface AllocationResult {
  bouquets: Bouquet[]; // priority order
  passes: number;
  deactivations: number;
}

const label = (bouquet: Bouquet): string => `${bouquet.name}${bouquet.size}`;

/**
 * Allocation Engine
 *
 * Owns one inventory and one bouquet list for the duration of run().
 *
 * Each pass reserves required flowers, then distributes filler. If some
 * active bouquet is still incomplete afterwards, the first one in priority
 * order gives its flowers back and leaves the run, and the pass repeats.
 * Every repeat deactivates one bouquet, so a run makes at most N + 1 passes.
 */
export class AllocationEngine {
  constructor(private readonly inventory: Inventory) {}

  run(designs: readonly Bouquet[]): AllocationResult {
    const bouquets = rankBouquets(designs, this.inventory);

    logger.debug('Bouquets ranked', {
      order: bouquets.map((b) => ({ bouquet: label(b), weight: b.weight, active: b.active })),
    });

    let passes = 0;
    let deactivations = 0;

    for (;;) {
      passes++;
      if (passes > bouquets.length + 1) {
        throw new AppError(
          ErrorCode.ALLOCATION_INVARIANT_VIOLATION,
          `Allocation did not settle after ${bouquets.length + 1} passes`,
          500,
          { passes, bouquets: bouquets.length }
        );
      }

      this.reserveRequired(bouquets);
      this.distributeFiller(bouquets);
      this.assertConservation(bouquets);

      const stuck = bouquets.find((b) => b.active && !b.completed);
      if (!stuck) break;

      this.release(stuck);
      stuck.deactivate(DeactivationReason.RELEASED);
      deactivations++;

      logger.debug('Bouquet released to free stock', { bouquet: label(stuck), pass: passes });
    }

    logger.debug('Allocation settled', { passes, deactivations });

    return { bouquets, passes, deactivations };
  }

  /**
   * Commit every outstanding required flower of a bouquet at once, or hand
   * back whatever it already holds
   */
  private reserveRequired(bouquets: readonly Bouquet[]): void {
    for (const bouquet of bouquets) {
      if (!bouquet.active || bouquet.designCompleted) continue;

      const outstanding = bouquet.requiredEntries.filter(
        (entry) => entry.designQuantity > entry.reservedQuantity
      );
      const requests: ReservationRequest[] = outstanding.map((entry) => ({
        species: entry.species,
        size: bouquet.size,
        quantity: entry.designQuantity - entry.reservedQuantity,
      }));

      if (this.inventory.reserveAll(requests)) {
        for (const entry of outstanding) {
          entry.reservedQuantity = entry.designQuantity;
        }
      } else {
        this.release(bouquet);
      }
    }
  }

  /**
   * Top up bouquets that hold all their required flowers. Species already in
   * the bouquet come first, then the rest of the inventory in order.
   */
  private distributeFiller(bouquets: readonly Bouquet[]): void {
    for (const bouquet of bouquets) {
      if (!bouquet.active || !bouquet.designCompleted || bouquet.completed) continue;

      const present = [...new Set(bouquet.entries.map((entry) => entry.species))];
      const others = this.inventory.species().filter((species) => !present.includes(species));

      for (const species of [...present, ...others]) {
        const quantity = Math.min(
          this.inventory.getAvailable(species, bouquet.size),
          bouquet.remainingCapacity
        );
        if (quantity > 0) {
          this.inventory.reserve(species, bouquet.size, quantity);
          bouquet.addFiller(species, quantity);
        }
        if (bouquet.completed) break;
      }
    }
  }

  private release(bouquet: Bouquet): void {
    for (const flower of bouquet.clearReservations()) {
      this.inventory.release(flower.species, bouquet.size, flower.quantity);
    }
  }

  /**
   * available + reserved must equal the initial stock for every cell
   */
  private assertConservation(bouquets: readonly Bouquet[]): void {
    const reserved = new Map<string, number>();
    for (const bouquet of bouquets) {
      for (const entry of bouquet.entries) {
        const key = `${entry.species}:${bouquet.size}`;
        reserved.set(key, (reserved.get(key) ?? 0) + entry.reservedQuantity);
      }
    }

    for (const species of this.inventory.species()) {
      for (const size of FLOWER_SIZES) {
        const available = this.inventory.getAvailable(species, size);
        const held = reserved.get(`${species}:${size}`) ?? 0;
        const initial = this.inventory.getInitial(species, size);

        if (available < 0 || available + held !== initial) {
          throw new AppError(
            ErrorCode.ALLOCATION_INVARIANT_VIOLATION,
            `Stock of ${species}${size} is not conserved`,
            500,
            { species, size, available, reserved: held, initial }
          );
        }
      }
    }
  }
}
