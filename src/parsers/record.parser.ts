import { DesignRecord } from '../types/bouquet.types';
import { FlowerQuantity, FlowerSize, StockRecord, isFlowerSize } from '../types/flower.types';
import { AppError, ErrorCode } from '../types/error.types';
import { Bouquet } from '../domain/bouquet';

// e.g. AL10a15b5c30: name, size, quantity/species pairs, total
const DESIGN_PATTERN = /^([A-Z])([LS])((?:\d+[a-z])+)(\d+)$/;
const DESIGN_FLOWER_PATTERN = /(\d+)([a-z])/g;
// e.g. aL: one flower per line
const FLOWER_PATTERN = /^([a-z])([LS])$/;

/**
 * Parse one bouquet design line
 *
 * @param lineNumber - 1-based, only used in the error
 */
export function parseDesignLine(line: string, lineNumber = 1): DesignRecord {
  const text = line.trim();
  const match = DESIGN_PATTERN.exec(text);
  const [, name, size, flowers, total] = match ?? [];

  if (!name || !size || !isFlowerSize(size) || !flowers || !total) {
    throw new AppError(
      ErrorCode.INVALID_DESIGN_RECORD,
      `Invalid bouquet design on line ${lineNumber}: "${text}"`,
      400,
      { line: lineNumber, text }
    );
  }

  const required: FlowerQuantity[] = [...flowers.matchAll(DESIGN_FLOWER_PATTERN)].map(
    ([, quantity, species]) => ({ species: species ?? '', quantity: Number(quantity) })
  );

  const counts = [Number(total), ...required.map((flower) => flower.quantity)];
  if (counts.some((count) => !Number.isSafeInteger(count))) {
    throw new AppError(
      ErrorCode.INVALID_DESIGN_RECORD,
      `Quantities are too large on line ${lineNumber}: "${text}"`,
      400,
      { line: lineNumber, text }
    );
  }

  if (counts.some((count) => count <= 0)) {
    throw new AppError(
      ErrorCode.INVALID_DESIGN_RECORD,
      `Quantities must be positive on line ${lineNumber}: "${text}"`,
      400,
      { line: lineNumber, text }
    );
  }

  return { name, size, total: Number(total), required };
}

/**
 * Parse one flower line
 */
export function parseFlowerLine(line: string, lineNumber = 1): { species: string; size: FlowerSize } {
  const text = line.trim();
  const [, species, size] = FLOWER_PATTERN.exec(text) ?? [];

  if (!species || !size || !isFlowerSize(size)) {
    throw new AppError(
      ErrorCode.INVALID_FLOWER_RECORD,
      `Invalid flower on line ${lineNumber}: "${text}"`,
      400,
      { line: lineNumber, text }
    );
  }

  return { species, size };
}

export function parseDesignLines(lines: readonly string[]): DesignRecord[] {
  return lines.map((line, index) => parseDesignLine(line, index + 1));
}

/**
 * Count flower lines into stock records, in first-seen order
 */
export function parseFlowerLines(lines: readonly string[]): StockRecord[] {
  const stock: StockRecord[] = [];

  lines.forEach((line, index) => {
    const flower = parseFlowerLine(line, index + 1);
    const existing = stock.find((r) => r.species === flower.species && r.size === flower.size);
    if (existing) {
      existing.quantity++;
    } else {
      stock.push({ ...flower, quantity: 1 });
    }
  });

  return stock;
}

/**
 * e.g. AL10a15b5c
 */
export function formatBouquet(bouquet: Bouquet): string {
  const flowers = bouquet
    .composition()
    .map((flower) => `${flower.quantity}${flower.species}`)
    .join('');

  return `${bouquet.name}${bouquet.size}${flowers}`;
}
