import { describe, it, expect } from 'vitest';
import { expandQuantities } from '../expandQuantities';
import { aggregateEstimate } from '../aggregate';
import { deriveSiteGeometry, roundQuantity } from '../quantityRules';
import { computeAllocation } from '../../allocation';
import { EstimateInputError } from '../../errors';
import type { Estimate, LineItem, ProjectInfo, SiteParameters } from '../../../types/estimate';

const PROJECT: ProjectInfo = { name: 'Test', location: '', preparedBy: '', date: '' };

function makeSite(overrides: Partial<SiteParameters> = {}): SiteParameters {
  return {
    grossAcres: 50,
    targetLotSizeSqFt: 8000,
    sewerType: 'public',
    hasSidewalk: true,
    curbType: 'standard',
    ...overrides,
  };
}

function build(site: SiteParameters): Estimate {
  const allocation = computeAllocation(site);
  return aggregateEstimate(PROJECT, site, allocation, expandQuantities(allocation, site));
}

function quantities(items: LineItem[]): Record<string, number> {
  return Object.fromEntries(items.map((i) => [i.code, i.quantity]));
}

describe('deriveSiteGeometry', () => {
  it('50 ac example', () => {
    const site = makeSite();
    const g = deriveSiteGeometry(site, computeAllocation(site));
    expect(g.roadLengthFt).toBeCloseTo(9583.2, 6);
    expect(g.pavementSy).toBeCloseTo(31944, 6);
    expect(g.intersections).toBe(16);
    expect(g.inlets).toBe(64);
    expect(g.manholes).toBe(24);
    expect(g.hydrants).toBe(20);
    expect(g.valves).toBe(12);
    expect(g.ponds).toBe(1);
    expect(g.disturbedAcres).toBe(42.5);
  });

  it('splits detention into ponds of at most 5 acres', () => {
    const site = makeSite({ grossAcres: 120 });
    // 8.4 ac of detention
    expect(deriveSiteGeometry(site, computeAllocation(site)).ponds).toBe(2);
  });
});

describe('roundQuantity', () => {
  it('keeps two decimals for acres', () => {
    expect(roundQuantity(42.456, 'AC')).toBe(42.46);
  });

  it('rounds other units to whole numbers', () => {
    expect(roundQuantity(68566.67, 'CY')).toBe(68567);
    expect(roundQuantity(2.4, 'EA')).toBe(2);
  });

  it('clamps negatives and NaN to zero', () => {
    expect(roundQuantity(-3, 'LF')).toBe(0);
    expect(roundQuantity(Number.NaN, 'LF')).toBe(0);
  });
});

describe('expandQuantities', () => {
  it('produces 45 items for public sewer with standard curb', () => {
    const site = makeSite();
    const items = expandQuantities(computeAllocation(site), site);
    const count = Object.values(items).reduce((s, list) => s + list.length, 0);
    expect(count).toBe(45);
  });

  it('example quantities and grand total', () => {
    const estimate = build(makeSite());
    const bySection = Object.fromEntries(estimate.sections.map((s) => [s.category, s]));

    expect(quantities(bySection.Earthwork.items)).toEqual({
      'EW-1': 42.5,
      'EW-2': 68567,
      'EW-3': 34283,
      'EW-4': 20973,
      'EW-5': 31944,
      'EW-6': 31944,
      'EW-7': 6857,
    });
    expect(quantities(bySection['Storm Drainage'].items)).toEqual({
      'SD-1': 2560,
      'SD-2': 4792,
      'SD-3': 2396,
      'SD-4': 64,
      'SD-5': 24,
      'SD-6': 2,
      'SD-7': 1,
      'SD-8': 22587,
      'SD-9': 16940,
    });
    expect(quantities(bySection['Paving & Concrete'].items)).toEqual({
      'PC-1': 31944,
      'PC-2': 31944,
      'PC-3': 19166,
      'PC-4': 76666,
      'PC-5': 32,
      'PC-6': 141,
    });

    expect(bySection.Earthwork.subtotal).toBeCloseTo(806517.6, 2);
    expect(bySection['Erosion Control'].subtotal).toBeCloseTo(157689.5, 2);
    expect(bySection['Storm Drainage'].subtotal).toBeCloseTo(1389977, 2);
    expect(bySection['Sanitary Sewer'].subtotal).toBeCloseTo(646220, 2);
    expect(bySection.Water.subtotal).toBeCloseTo(744935, 2);
    expect(bySection['Paving & Concrete'].subtotal).toBeCloseTo(2844404, 2);
    expect(bySection['Striping & Signage'].subtotal).toBeCloseTo(33424.7, 2);
    expect(bySection['Fencing & Misc'].subtotal).toBeCloseTo(45236, 2);

    expect(estimate.grandTotal).toBeCloseTo(6668403.8, 2);
    expect(estimate.costPerLot).toBeCloseTo(6668403.8 / 141, 6);
    expect(estimate.costPerAcre).toBeCloseTo(6668403.8 / 50, 6);
  });

  it('septic swaps SS items for SP items', () => {
    const publicEst = build(makeSite());
    const septicEst = build(makeSite({ sewerType: 'septic' }));
    const sewer = septicEst.sections.find((s) => s.category === 'Sanitary Sewer');

    expect(quantities(sewer?.items ?? [])).toEqual({ 'SP-1': 141, 'SP-2': 42300, 'SP-3': 141 });
    expect(sewer?.subtotal).toBeCloseTo(1487550, 2);
    expect(septicEst.grandTotal).toBeCloseTo(7509733.8, 2);
    expect(septicEst.grandTotal - publicEst.grandTotal).toBeCloseTo(1487550 - 646220, 2);
  });

  it('rolled curb substitutes PC-3R', () => {
    const est = build(makeSite({ curbType: 'rolled' }));
    const paving = est.sections.find((s) => s.category === 'Paving & Concrete');
    const codes = paving?.items.map((i) => i.code);
    expect(codes).toContain('PC-3R');
    expect(codes).not.toContain('PC-3');
    expect(paving?.items.find((i) => i.code === 'PC-3R')?.quantity).toBe(19166);
    expect(est.grandTotal).toBeCloseTo(6630071.8, 2);
  });

  it('no curb keeps PC-3 at zero', () => {
    const est = build(makeSite({ curbType: 'none' }));
    const pc3 = est.sections.flatMap((s) => s.items).find((i) => i.code === 'PC-3');
    expect(pc3?.quantity).toBe(0);
    expect(pc3?.total).toBe(0);
    expect(est.grandTotal).toBeCloseTo(6170087.8, 2);
  });

  it('without sidewalks, sidewalk and ramps are zero', () => {
    const est = build(makeSite({ hasSidewalk: false }));
    const items = est.sections.flatMap((s) => s.items);
    expect(items.find((i) => i.code === 'PC-4')?.quantity).toBe(0);
    expect(items.find((i) => i.code === 'PC-5')?.quantity).toBe(0);
    expect(est.grandTotal).toBeCloseTo(6023075.8, 2);
  });

  it('regenerating with identical inputs is idempotent', () => {
    const site = makeSite({ grossAcres: 73.5, targetLotSizeSqFt: 7200 });
    const a = build(site);
    const b = build(site);
    expect(b.sections).toEqual(a.sections);
    expect(b.grandTotal).toBe(a.grandTotal);
  });

  it('rejects unknown sewer and curb types', () => {
    const site = makeSite();
    const allocation = computeAllocation(site);
    const badSewer: SiteParameters = Object.assign(makeSite(), { sewerType: 'lagoon' });
    expect(() => expandQuantities(allocation, badSewer)).toThrow(EstimateInputError);
    const badCurb: SiteParameters = Object.assign(makeSite(), { curbType: 'granite' });
    expect(() => expandQuantities(allocation, badCurb)).toThrow(/curbType must be one of/);
  });

  describe('price policy', () => {
    const EDITED = { 'EW-2': 7, 'SS-1': 55 };

    it('preserve keeps an edited price by item code', () => {
      const site = makeSite({ grossAcres: 60 });
      const allocation = computeAllocation(site);
      const items = expandQuantities(allocation, site, { priceOverrides: EDITED, pricePolicy: 'preserve' });
      const ew2 = items.Earthwork.find((i) => i.code === 'EW-2');
      expect(ew2?.unitPrice).toBe(7);
    });

    it('reset returns to the template default', () => {
      const site = makeSite({ grossAcres: 60 });
      const allocation = computeAllocation(site);
      const items = expandQuantities(allocation, site, { priceOverrides: EDITED, pricePolicy: 'reset' });
      expect(items.Earthwork.find((i) => i.code === 'EW-2')?.unitPrice).toBe(5);
    });

    it('an edited price for an omitted item is ignored, not an error', () => {
      const site = makeSite({ sewerType: 'septic' });
      const allocation = computeAllocation(site);
      const items = expandQuantities(allocation, site, { priceOverrides: EDITED });
      expect(items['Sanitary Sewer'].some((i) => i.code === 'SS-1')).toBe(false);
      expect(items.Earthwork.find((i) => i.code === 'EW-2')?.unitPrice).toBe(7);
    });
  });
});
