import { Bouquet } from './bouquet';
import { Inventory } from './inventory';
import { DeactivationReason } from '../types/bouquet.types';
import { logger } from '../config/logger';

export type WeightAssessment =
  | { eligible: true; weight: number }
  | { eligible: false; weight: 0; reason: string };

/**
 * Share of the available stock a demand would consume, in [0, 1] when
 * quantity <= available. Callers guarantee available > 0.
 */
export const scarcityWeight = (available: number, quantity: number): number =>
  1 - (available - quantity) / available;

/**
 * Score a bouquet against the current stock without mutating anything
 *
 * weight = sum of per-species scarcity of the required flowers
 *        + scarcity of the whole bouquet against its size class
 */
export function assessBouquet(bouquet: Bouquet, inventory: Inventory): WeightAssessment {
  if (!bouquet.active) {
    return { eligible: false, weight: 0, reason: 'already inactive' };
  }

  const sizeStock = inventory.totalBySize(bouquet.size);
  if (sizeStock < bouquet.total) {
    return {
      eligible: false,
      weight: 0,
      reason: `needs ${bouquet.total} flowers of size ${bouquet.size}, only ${sizeStock} in stock`,
    };
  }

  if (bouquet.malformed) {
    return {
      eligible: false,
      weight: 0,
      reason: `required flowers (${bouquet.requiredTotal}) exceed total (${bouquet.total})`,
    };
  }

  // a species named twice in a design draws on the same stock
  const demand = new Map<string, number>();
  for (const entry of bouquet.requiredEntries) {
    demand.set(entry.species, (demand.get(entry.species) ?? 0) + entry.designQuantity);
  }

  let weight = 0;
  for (const [species, quantity] of demand) {
    const available = inventory.getAvailable(species, bouquet.size);
    if (available < quantity) {
      return {
        eligible: false,
        weight: 0,
        reason: `needs ${quantity} of ${species}${bouquet.size}, only ${available} in stock`,
      };
    }
    weight += scarcityWeight(available, quantity);
  }

  return { eligible: true, weight: weight + scarcityWeight(sizeStock, bouquet.total) };
}

/**
 * Assign weights, deactivate unsatisfiable bouquets and sort by weight
 * descending. Array.prototype.sort is stable, so ties keep input order.
 */
export function rankBouquets(bouquets: readonly Bouquet[], inventory: Inventory): Bouquet[] {
  for (const bouquet of bouquets) {
    const assessment = assessBouquet(bouquet, inventory);
    bouquet.weight = assessment.weight;

    if (!assessment.eligible && bouquet.active) {
      bouquet.deactivate(DeactivationReason.UNSATISFIABLE);
      logger.debug('Bouquet rejected before allocation', {
        bouquet: `${bouquet.name}${bouquet.size}`,
        reason: assessment.reason,
      });
    }
  }

  return [...bouquets].sort((a, b) => b.weight - a.weight);
}
