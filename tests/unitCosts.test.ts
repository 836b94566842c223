import { describe, expect, test } from '@jest/globals';
import {
  diodeUnitPriceGbp,
  epoxyCostPerMl,
  foamCostPerPiece,
  kaptonCostPerDisk,
  rollCostPerMetre,
  rollLengthMetres,
  silverCostPerMm,
  toGbp,
  unitCostGbp,
  weldCostPerWeld,
} from '../src/lib/costing';

describe('silverCostPerMm', () => {
  const ribbon = { id: 'AG', name: 'Ribbon', widthMm: 2.0, thicknessMm: 0.0254, densityGCm3: 10.49, pricePerG: 0.8, priceCurrency: 'USD' as const };

  test('converts volume per mm to grams and prices them in GBP', () => {
    // (0.2 * 0.00254 * 0.1) cm3 * 10.49 g/cm3 * (0.8 * 0.8) GBP/g
    expect(silverCostPerMm(ribbon, 0.8)).toBeCloseTo(0.000341050880, 12);
  });

  test('a width override replaces the catalog width', () => {
    expect(silverCostPerMm(ribbon, 0.8, 1.0)).toBeCloseTo(0.000170525440, 12);
  });

  test('zero width, thickness or density gives zero', () => {
    expect(silverCostPerMm({ ...ribbon, widthMm: 0 }, 0.8)).toBe(0);
    expect(silverCostPerMm({ ...ribbon, thicknessMm: undefined }, 0.8)).toBe(0);
    expect(silverCostPerMm({ ...ribbon, densityGCm3: -1 }, 0.8)).toBe(0);
    expect(silverCostPerMm(ribbon, 0.8, 0)).toBe(0);
  });

  test('a USD ribbon and the equivalent GBP ribbon cost the same per mm', () => {
    const rate = 0.79;
    const gbp = silverCostPerMm({ ...ribbon, priceCurrency: 'GBP', pricePerG: 0.8 * rate }, rate);
    expect(silverCostPerMm(ribbon, rate)).toBeCloseTo(gbp, 12);
  });

  test('price currency defaults to USD', () => {
    const { priceCurrency: _ignored, ...noCurrency } = ribbon;
    expect(silverCostPerMm(noCurrency, 0.5)).toBeCloseTo(silverCostPerMm({ ...ribbon, priceCurrency: 'GBP', pricePerG: 0.4 }, 0.5), 12);
  });
});

describe('diodeUnitPriceGbp', () => {
  test('USD price is converted once', () => {
    expect(diodeUnitPriceGbp({ id: 'D', name: 'D', unitCostUsd: 0.5, currency: 'USD' }, 0.8)).toBeCloseTo(0.4, 12);
  });

  test('GBP price is used as is', () => {
    expect(diodeUnitPriceGbp({ id: 'D', name: 'D', unitCostGbp: 0.4, unitCostUsd: 9, currency: 'GBP' }, 0.8)).toBe(0.4);
  });

  test('currency defaults to USD and a missing price is zero', () => {
    expect(diodeUnitPriceGbp({ id: 'D', name: 'D', unitCostGbp: 0.4 }, 0.8)).toBe(0);
  });

  test('a USD item and the equivalent GBP item cost the same', () => {
    const rate = 0.79;
    const usd = diodeUnitPriceGbp({ id: 'D', name: 'D', unitCostUsd: 2, currency: 'USD' }, rate);
    const gbp = diodeUnitPriceGbp({ id: 'D', name: 'D', unitCostGbp: 2 * rate, currency: 'GBP' }, rate);
    expect(usd).toBeCloseTo(gbp, 12);
  });
});

describe('weldCostPerWeld', () => {
  test('spreads the head price over its welds', () => {
    expect(weldCostPerWeld({ id: 'W', name: 'W', unitCostUsd: 50, numWelds: 1000 }, 0.8)).toBeCloseTo(0.04, 12);
  });

  test('a USD head and the equivalent GBP head cost the same per weld', () => {
    const rate = 0.79;
    const usd = weldCostPerWeld({ id: 'W', name: 'W', unitCostUsd: 50, numWelds: 1000, currency: 'USD' }, rate);
    const gbp = weldCostPerWeld({ id: 'W', name: 'W', unitCostGbp: 50 * rate, numWelds: 1000, currency: 'GBP' }, rate);
    expect(usd).toBeCloseTo(gbp, 12);
  });

  test('zero or missing weld count gives zero', () => {
    expect(weldCostPerWeld({ id: 'W', name: 'W', unitCostUsd: 50, numWelds: 0 }, 0.8)).toBe(0);
    expect(weldCostPerWeld({ id: 'W', name: 'W', unitCostUsd: 50 }, 0.8)).toBe(0);
  });
});

describe('roll costs', () => {
  test('feet are converted to metres', () => {
    expect(rollLengthMetres({ id: 'R', name: 'R', rollLengthValue: 100, rollLengthUnit: 'ft' })).toBeCloseTo(30.48, 10);
    expect(rollLengthMetres({ id: 'R', name: 'R', rollLengthValue: 25 })).toBe(25);
  });

  test('GBP roll cost wins over USD', () => {
    expect(rollCostPerMetre({ id: 'R', name: 'R', rollLengthValue: 50, rollCostGbp: 25, rollCostUsd: 1000 }, 0.8)).toBeCloseTo(0.5, 12);
  });

  test('USD roll cost is converted', () => {
    expect(rollCostPerMetre({ id: 'R', name: 'R', rollLengthValue: 50, rollCostUsd: 25 }, 0.8)).toBeCloseTo(0.4, 12);
  });

  test('a USD roll and the equivalent GBP roll cost the same per metre', () => {
    const rate = 0.79;
    const usd = rollCostPerMetre({ id: 'R', name: 'R', rollLengthValue: 50, rollCostUsd: 25 }, rate);
    const gbp = rollCostPerMetre({ id: 'R', name: 'R', rollLengthValue: 50, rollCostGbp: 25 * rate }, rate);
    expect(usd).toBeCloseTo(gbp, 12);
  });

  test('zero roll length gives zero', () => {
    expect(rollCostPerMetre({ id: 'R', name: 'R', rollLengthValue: 0, rollCostGbp: 25 }, 0.8)).toBe(0);
  });
});

describe('misc costs', () => {
  test('Kapton precomputed cost per disk short-circuits', () => {
    expect(kaptonCostPerDisk({ id: 'K', name: 'K', type: 'Kapton', costPerDiskGbp: 0.03, disksPerRoll: 0 }, 0.8)).toBe(0.03);
  });

  test('Kapton roll cost is spread over the disks', () => {
    expect(kaptonCostPerDisk({ id: 'K', name: 'K', type: 'Kapton', disksPerRoll: 500, rollCostGbp: 10 }, 0.8)).toBeCloseTo(0.02, 12);
    expect(kaptonCostPerDisk({ id: 'K', name: 'K', type: 'Kapton', disksPerRoll: 500, rollCostUsd: 10 }, 0.8)).toBeCloseTo(0.016, 12);
  });

  test('Kapton without disks per roll gives zero', () => {
    expect(kaptonCostPerDisk({ id: 'K', name: 'K', type: 'Kapton', rollCostGbp: 10 }, 0.8)).toBe(0);
  });

  test('epoxy cost per mL', () => {
    expect(epoxyCostPerMl({ id: 'E', name: 'E', type: 'Epoxy', costPerMlGbp: 0.3 }, 0.8)).toBe(0.3);
    expect(epoxyCostPerMl({ id: 'E', name: 'E', type: 'Epoxy', volumeMl: 50, totalCostGbp: 10 }, 0.8)).toBeCloseTo(0.2, 12);
    expect(epoxyCostPerMl({ id: 'E', name: 'E', type: 'Epoxy', volumeMl: 50, totalCostUsd: 10, currency: 'USD' }, 0.8)).toBeCloseTo(0.16, 12);
  });

  test('epoxy currency defaults to GBP so a bare USD total is ignored', () => {
    expect(epoxyCostPerMl({ id: 'E', name: 'E', type: 'Epoxy', volumeMl: 50, totalCostUsd: 10 }, 0.8)).toBe(0);
  });
});

describe('packaging costs', () => {
  test('unit cost prefers GBP', () => {
    expect(unitCostGbp({ id: 'F', name: 'F', type: 'Frame', unitCostGbp: 3, unitCostUsd: 10, currency: 'USD' }, 0.8)).toBe(3);
    expect(unitCostGbp({ id: 'F', name: 'F', type: 'Frame', unitCostUsd: 10, currency: 'USD' }, 0.8)).toBeCloseTo(8, 12);
    expect(unitCostGbp({ id: 'F', name: 'F', type: 'Frame', unitCostUsd: 10 }, 0.8)).toBe(0);
  });

  test('foam cost per piece', () => {
    expect(foamCostPerPiece({ id: 'F', name: 'F', type: 'Foam', numPieces: 10, totalCostGbp: 5 }, 0.8)).toBeCloseTo(0.5, 12);
    expect(foamCostPerPiece({ id: 'F', name: 'F', type: 'Foam', numPieces: 0, totalCostGbp: 5 }, 0.8)).toBe(0);
  });

  test('toGbp leaves GBP untouched', () => {
    expect(toGbp(10, 'GBP', 0.8)).toBe(10);
    expect(toGbp(10, 'USD', 0.8)).toBeCloseTo(8, 12);
  });
});
