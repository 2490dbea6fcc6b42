import { AllocationEngine } from '../domain/allocation-engine';
import { Bouquet } from '../domain/bouquet';
import { Inventory } from '../domain/inventory';
import { formatBouquet, parseDesignLines, parseFlowerLines } from '../parsers/record.parser';
import { sampleRunSchema } from '../validators/allocation.validator';
import { AllocationInput, AllocationReport, BouquetSummary } from '../types/bouquet.types';
import { AppError, ErrorCode } from '../types/error.types';
import { logger } from '../config/logger';
import { env } from '../config/environment';
import sampleRun from '../../data/sample-run.json';

/**
 * Allocation Service
 *
 * Builds a fresh inventory and bouquet list for every run, hands them to the
 * engine and turns the outcome into a report. Nothing is shared across runs.
 */
export class AllocationService {
  constructor(private maxDesignsPerRun: number = env.MAX_DESIGNS_PER_RUN) {}

  /**
   * Allocate stock to structured design records
   */
  allocate(input: AllocationInput): AllocationReport {
    if (input.designs.length > this.maxDesignsPerRun) {
      throw new AppError(
        ErrorCode.INVALID_INPUT,
        `Cannot allocate ${input.designs.length} designs in one run. Maximum is ${this.maxDesignsPerRun}.`,
        400,
        { designs: input.designs.length, maximum: this.maxDesignsPerRun }
      );
    }

    logger.info('Starting allocation run', {
      designs: input.designs.length,
      stockRecords: input.stock.length,
    });

    const inventory = new Inventory(input.stock);
    const bouquets = input.designs.map((design) => new Bouquet(design));
    const result = new AllocationEngine(inventory).run(bouquets);

    const summaries = result.bouquets.map(summarize);
    const completed = summaries.filter((b) => b.completed).map((b) => b.formatted);

    logger.info('Allocation run complete', {
      completed: completed.length,
      abandoned: summaries.length - completed.length,
      passes: result.passes,
    });

    return {
      bouquets: summaries,
      completed,
      remainingStock: inventory.snapshot(),
      passes: result.passes,
      deactivations: result.deactivations,
    };
  }

  /**
   * Allocate from text records: design lines like AL10a15b5c30 and one
   * flower per line like aL
   */
  allocateText(designLines: readonly string[], flowerLines: readonly string[]): AllocationReport {
    return this.allocate({
      designs: parseDesignLines(designLines),
      stock: parseFlowerLines(flowerLines),
    });
  }

  /**
   * Run the bundled sample data set
   */
  allocateSample(): AllocationReport {
    const sample = sampleRunSchema.parse(sampleRun);

    return this.allocate({
      designs: parseDesignLines(sample.designs),
      stock: sample.stock,
    });
  }
}

function summarize(bouquet: Bouquet): BouquetSummary {
  return {
    name: bouquet.name,
    size: bouquet.size,
    total: bouquet.total,
    weight: bouquet.weight,
    active: bouquet.active,
    completed: bouquet.completed,
    deactivationReason: bouquet.deactivationReason,
    flowers: bouquet.composition(),
    formatted: formatBouquet(bouquet),
  };
}
