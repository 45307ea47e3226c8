import {
  AssumptionData,
  OTHER_KEY,
  UNKNOWN_KEY,
  categoryKey,
  categoryKeyId,
  categoryKeyLabel,
  getHorizonAssumption,
  isAssetClassName,
  isSpecialKey,
} from '../../models/AssetClass';

describe('categoryKey', () => {
  it('should label categories with their class', () => {
    expect(categoryKeyLabel(categoryKey('Stocks', 'Large Cap'))).toBe('Stocks:Large Cap');
    expect(categoryKeyLabel(OTHER_KEY)).toBe('Other');
    expect(categoryKeyLabel(UNKNOWN_KEY)).toBe('Unknown');
  });

  it('should keep ids distinct when names contain the separator', () => {
    const a = categoryKeyId(categoryKey('Stocks', 'A:B'));
    const b = categoryKeyId(categoryKey('Stocks:A', 'B'));
    expect(a).not.toBe(b);
  });

  it('should give equal keys equal ids', () => {
    expect(categoryKeyId(categoryKey('Bonds', 'Treasury'))).toBe(categoryKeyId(categoryKey('Bonds', 'Treasury')));
  });

  it('should not collide a category named Other with the Other bucket', () => {
    expect(categoryKeyId(categoryKey('Other', 'Other'))).not.toBe(categoryKeyId(OTHER_KEY));
  });

  it('should flag the fallback buckets as special', () => {
    expect(isSpecialKey(OTHER_KEY)).toBe(true);
    expect(isSpecialKey(UNKNOWN_KEY)).toBe(true);
    expect(isSpecialKey(categoryKey('Stocks', 'Large Cap'))).toBe(false);
  });
});

describe('isAssetClassName', () => {
  it('should accept the four asset classes only', () => {
    expect(['Stocks', 'Bonds', 'Crypto', 'Other'].every(isAssetClassName)).toBe(true);
    expect(isAssetClassName('Gold')).toBe(false);
    expect(isAssetClassName('stocks')).toBe(false);
  });
});

describe('getHorizonAssumption', () => {
  const data: AssumptionData = {
    id: 'cma',
    name: 'Market assumptions',
    horizons: {
      '10yr': { expectedReturnPct: 6.5, volatilityPct: 16 },
      '20yr': { expectedReturnPct: 7 },
    },
  };

  it('should convert percentages to fractions', () => {
    expect(getHorizonAssumption(data, '10yr')).toEqual({ meanReturn: 0.065, stdDev: 0.16 });
  });

  it('should return null for an incomplete slice', () => {
    expect(getHorizonAssumption(data, '20yr')).toBeNull();
  });

  it('should return null for a missing slice', () => {
    expect(getHorizonAssumption(data, '5yr')).toBeNull();
  });
});
