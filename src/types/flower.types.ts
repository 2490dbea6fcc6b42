/**
 * Flower domain types
 */

export const FLOWER_SIZES = ['L', 'S'] as const;

export type FlowerSize = (typeof FLOWER_SIZES)[number];

// Role of an entry inside a bouquet
export enum FlowerRole {
  REQUIRED = 'REQUIRED',
  FILLER = 'FILLER',
}

export interface FlowerEntry {
  species: string;
  role: FlowerRole;
  designQuantity: number; // 0 for filler entries
  reservedQuantity: number;
}

// Stock record handed to the inventory (several records for one cell add up)
export interface StockRecord {
  species: string;
  size: FlowerSize;
  quantity: number;
}

// A single reservation against the inventory
export interface ReservationRequest {
  species: string;
  size: FlowerSize;
  quantity: number;
}

// Species and quantity pair as reported for a bouquet
export interface FlowerQuantity {
  species: string;
  quantity: number;
}

export const isFlowerSize = (value: string): value is FlowerSize =>
  FLOWER_SIZES.some((size) => size === value);
