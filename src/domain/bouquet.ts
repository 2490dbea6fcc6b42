import { FlowerEntry, FlowerQuantity, FlowerRole, FlowerSize } from '../types/flower.types';
import { DeactivationReason, DesignRecord } from '../types/bouquet.types';

/**
 * Bouquet
 *
 * A design being built during one allocation run. Required entries exist from
 * creation; filler entries are appended while the engine tops the bouquet up.
 * Completion state is always derived from the entries.
 */
export class Bouquet {
  readonly name: string;
  readonly size: FlowerSize;
  readonly total: number;
  entries: FlowerEntry[];
  active = true;
  weight = 0;
  deactivationReason: DeactivationReason | null = null;

  constructor(record: DesignRecord) {
    this.name = record.name;
    this.size = record.size;
    this.total = record.total;
    this.entries = record.required.map((flower) => ({
      species: flower.species,
      role: FlowerRole.REQUIRED,
      designQuantity: flower.quantity,
      reservedQuantity: 0,
    }));
  }

  get requiredEntries(): FlowerEntry[] {
    return this.entries.filter((entry) => entry.role === FlowerRole.REQUIRED);
  }

  get requiredTotal(): number {
    return this.requiredEntries.reduce((sum, entry) => sum + entry.designQuantity, 0);
  }

  get reservedTotal(): number {
    return this.entries.reduce((sum, entry) => sum + entry.reservedQuantity, 0);
  }

  get remainingCapacity(): number {
    return this.total - this.reservedTotal;
  }

  /**
   * Required quantities can never fit into the total
   */
  get malformed(): boolean {
    return this.requiredTotal > this.total;
  }

  get designCompleted(): boolean {
    return this.requiredEntries.every((entry) => entry.reservedQuantity >= entry.designQuantity);
  }

  get completed(): boolean {
    return this.designCompleted && this.reservedTotal === this.total;
  }

  /**
   * Add filler flowers, merging into the existing filler entry for the species
   */
  addFiller(species: string, quantity: number): void {
    const existing = this.entries.find(
      (entry) => entry.role === FlowerRole.FILLER && entry.species === species
    );

    if (existing) {
      existing.reservedQuantity += quantity;
      return;
    }

    this.entries.push({
      species,
      role: FlowerRole.FILLER,
      designQuantity: 0,
      reservedQuantity: quantity,
    });
  }

  /**
   * Zero every reservation and drop filler entries
   *
   * @returns the quantities that were held, to be credited back to the inventory.
   * A second call returns nothing.
   */
  clearReservations(): FlowerQuantity[] {
    const released = this.entries
      .filter((entry) => entry.reservedQuantity > 0)
      .map((entry) => ({ species: entry.species, quantity: entry.reservedQuantity }));

    this.entries = this.entries.filter((entry) => entry.role === FlowerRole.REQUIRED);
    for (const entry of this.entries) {
      entry.reservedQuantity = 0;
    }

    return released;
  }

  deactivate(reason: DeactivationReason): void {
    this.active = false;
    this.deactivationReason = reason;
  }

  /**
   * Reserved flowers summed per species, sorted by species
   */
  composition(): FlowerQuantity[] {
    const bySpecies = new Map<string, number>();
    for (const entry of this.entries) {
      if (entry.reservedQuantity > 0) {
        bySpecies.set(entry.species, (bySpecies.get(entry.species) ?? 0) + entry.reservedQuantity);
      }
    }

    return [...bySpecies.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([species, quantity]) => ({ species, quantity }));
  }
}
