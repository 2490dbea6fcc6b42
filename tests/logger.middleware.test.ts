import { describe, it, expect } from 'vitest';
import { countDesigns } from '../src/middleware/logger.middleware';

describe('countDesigns', () => {
  it('counts the designs of an allocation body', () => {
    expect(countDesigns({ designs: ['AL1a1', 'BS2b2'], flowers: [] })).toBe(2);
  });

  it('is undefined for bodies without a designs array', () => {
    expect(countDesigns(undefined)).toBeUndefined();
    expect(countDesigns({})).toBeUndefined();
    expect(countDesigns({ designs: 'AL1a1' })).toBeUndefined();
  });
});
