import { FlowerQuantity, FlowerSize, StockRecord } from './flower.types';

/**
 * Bouquet domain types
 */

// Why a bouquet left the run
export enum DeactivationReason {
  UNSATISFIABLE = 'UNSATISFIABLE', // rejected by the ranker before allocation
  RELEASED = 'RELEASED', // abandoned by the engine to free stock
}

// Structured design record (input boundary)
export interface DesignRecord {
  name: string;
  size: FlowerSize;
  total: number;
  required: FlowerQuantity[];
}

// Allocation input as accepted by the service
export interface AllocationInput {
  designs: DesignRecord[];
  stock: StockRecord[];
}

// Per-bouquet outcome
export interface BouquetSummary {
  name: string;
  size: FlowerSize;
  total: number;
  weight: number;
  active: boolean;
  completed: boolean;
  deactivationReason: DeactivationReason | null;
  flowers: FlowerQuantity[];
  formatted: string;
}

export interface AllocationReport {
  bouquets: BouquetSummary[];
  completed: string[];
  remainingStock: StockRecord[];
  passes: number;
  deactivations: number;
}
