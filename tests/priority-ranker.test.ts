import { describe, it, expect } from 'vitest';
import { Bouquet } from '../src/domain/bouquet';
import { Inventory } from '../src/domain/inventory';
import { assessBouquet, rankBouquets, scarcityWeight } from '../src/domain/priority-ranker';
import { DeactivationReason, DesignRecord } from '../src/types/bouquet.types';
import { StockRecord } from '../src/types/flower.types';

const twentyOfEachLarge: StockRecord[] = [
  { species: 'a', size: 'L', quantity: 20 },
  { species: 'b', size: 'L', quantity: 20 },
  { species: 'c', size: 'L', quantity: 20 },
];

const AL: DesignRecord = {
  name: 'A',
  size: 'L',
  total: 30,
  required: [
    { species: 'a', quantity: 10 },
    { species: 'b', quantity: 15 },
    { species: 'c', quantity: 5 },
  ],
};

const BL: DesignRecord = {
  name: 'B',
  size: 'L',
  total: 21,
  required: [
    { species: 'b', quantity: 15 },
    { species: 'c', quantity: 1 },
  ],
};

describe('scarcityWeight', () => {
  it('is the share of stock the demand consumes', () => {
    expect(scarcityWeight(20, 10)).toBe(0.5);
    expect(scarcityWeight(20, 20)).toBe(1);
    expect(scarcityWeight(20, 0)).toBe(0);
  });
});

describe('assessBouquet', () => {
  it('sums per-species scarcity and the size-class scarcity', () => {
    const inventory = new Inventory(twentyOfEachLarge);

    const al = assessBouquet(new Bouquet(AL), inventory);
    const bl = assessBouquet(new Bouquet(BL), inventory);

    // 0.5 + 0.75 + 0.25 + (1 - 30/60)
    expect(al.eligible).toBe(true);
    expect(al.weight).toBeCloseTo(2.0, 10);
    // 0.75 + 0.05 + (1 - 39/60)
    expect(bl.eligible).toBe(true);
    expect(bl.weight).toBeCloseTo(1.15, 10);
  });

  it('rejects a bouquet larger than the stock of its size', () => {
    const inventory = new Inventory([{ species: 'a', size: 'S', quantity: 9 }]);
    const bouquet = new Bouquet({ name: 'C', size: 'S', total: 10, required: [] });

    expect(assessBouquet(bouquet, inventory)).toEqual({
      eligible: false,
      weight: 0,
      reason: 'needs 10 flowers of size S, only 9 in stock',
    });
  });

  it('rejects a bouquet needing more of a species than exists', () => {
    const inventory = new Inventory(twentyOfEachLarge);
    const bouquet = new Bouquet({
      name: 'D',
      size: 'L',
      total: 25,
      required: [{ species: 'b', quantity: 21 }],
    });

    const assessment = assessBouquet(bouquet, inventory);

    expect(assessment.eligible).toBe(false);
    expect(assessment.weight).toBe(0);
  });

  it('rejects a species missing from the inventory', () => {
    const inventory = new Inventory(twentyOfEachLarge);
    const bouquet = new Bouquet({
      name: 'E',
      size: 'L',
      total: 5,
      required: [{ species: 'z', quantity: 1 }],
    });

    expect(assessBouquet(bouquet, inventory).eligible).toBe(false);
  });

  it('adds up a species named twice before checking its stock', () => {
    const inventory = new Inventory([
      { species: 'a', size: 'L', quantity: 6 },
      { species: 'b', size: 'L', quantity: 10 },
    ]);
    const bouquet = new Bouquet({
      name: 'A',
      size: 'L',
      total: 10,
      required: [
        { species: 'a', quantity: 5 },
        { species: 'a', quantity: 5 },
      ],
    });

    expect(assessBouquet(bouquet, inventory)).toEqual({
      eligible: false,
      weight: 0,
      reason: 'needs 10 of aL, only 6 in stock',
    });
  });

  it('weighs a species named twice once, on its summed quantity', () => {
    const inventory = new Inventory([{ species: 'a', size: 'L', quantity: 20 }]);
    const bouquet = new Bouquet({
      name: 'A',
      size: 'L',
      total: 10,
      required: [
        { species: 'a', quantity: 4 },
        { species: 'a', quantity: 6 },
      ],
    });

    // (1 - 10/20) + (1 - 10/20)
    expect(assessBouquet(bouquet, inventory).weight).toBeCloseTo(1.0, 10);
  });

  it('rejects required quantities that exceed the total', () => {
    const inventory = new Inventory(twentyOfEachLarge);
    const bouquet = new Bouquet({
      name: 'F',
      size: 'L',
      total: 5,
      required: [
        { species: 'a', quantity: 3 },
        { species: 'b', quantity: 3 },
      ],
    });

    expect(assessBouquet(bouquet, inventory)).toEqual({
      eligible: false,
      weight: 0,
      reason: 'required flowers (6) exceed total (5)',
    });
  });
});

describe('rankBouquets', () => {
  it('orders by weight descending', () => {
    const inventory = new Inventory(twentyOfEachLarge);
    const bl = new Bouquet(BL);
    const al = new Bouquet(AL);

    const ranked = rankBouquets([bl, al], inventory);

    expect(ranked.map((b) => b.name)).toEqual(['A', 'B']);
    expect(al.weight).toBeCloseTo(2.0, 10);
    expect(bl.weight).toBeCloseTo(1.15, 10);
  });

  it('deactivates unsatisfiable bouquets with weight 0 before allocation', () => {
    const inventory = new Inventory(twentyOfEachLarge);
    const greedy = new Bouquet({
      name: 'G',
      size: 'L',
      total: 40,
      required: [{ species: 'a', quantity: 25 }],
    });

    const ranked = rankBouquets([greedy, new Bouquet(AL)], inventory);

    expect(ranked.map((b) => b.name)).toEqual(['A', 'G']);
    expect(greedy.active).toBe(false);
    expect(greedy.weight).toBe(0);
    expect(greedy.deactivationReason).toBe(DeactivationReason.UNSATISFIABLE);
  });

  it('keeps input order for equal weights', () => {
    const inventory = new Inventory(twentyOfEachLarge);
    const designs = ['X', 'Y', 'Z'].map(
      (name) => new Bouquet({ ...BL, name })
    );

    expect(rankBouquets(designs, inventory).map((b) => b.name)).toEqual(['X', 'Y', 'Z']);
  });

  it('does not mutate the input array', () => {
    const inventory = new Inventory(twentyOfEachLarge);
    const designs = [new Bouquet(BL), new Bouquet(AL)];

    rankBouquets(designs, inventory);

    expect(designs.map((b) => b.name)).toEqual(['B', 'A']);
  });
});
