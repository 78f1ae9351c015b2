import { describe, it, expect } from 'vitest';
import { aggregateEstimate, buildSection, categoryTotals, roundCents, updateLineItem } from '../aggregate';
import { computeAllocation } from '../../allocation';
import { EstimateInputError } from '../../errors';
import type { Estimate, LineItem, SiteParameters } from '../../../types/estimate';

const SITE: SiteParameters = {
  grossAcres: 20,
  targetLotSizeSqFt: 10000,
  sewerType: 'public',
  hasSidewalk: true,
  curbType: 'standard',
};

function makeItem(overrides: Partial<LineItem> = {}): LineItem {
  return {
    category: 'Water',
    code: 'W-1',
    name: 'Water Main',
    quantity: 100,
    unit: 'LF',
    unitPrice: 45,
    total: 0,
    ...overrides,
  };
}

function makeEstimate(): Estimate {
  return aggregateEstimate(
    { name: 'Agg', location: '', preparedBy: '', date: '' },
    SITE,
    computeAllocation(SITE),
    {
      Water: [makeItem(), makeItem({ code: 'W-2', name: 'Hydrant', unit: 'EA', quantity: 3, unitPrice: 4000 })],
      Earthwork: [makeItem({ category: 'Earthwork', code: 'EW-1', name: 'Clearing', unit: 'AC', quantity: 2.5, unitPrice: 5500 })],
    },
  );
}

describe('buildSection', () => {
  it('recomputes totals from quantity and unit price', () => {
    const s = buildSection('Water', [makeItem({ total: 999 })]);
    expect(s.items[0].total).toBe(4500);
    expect(s.subtotal).toBe(4500);
  });

  it('rounds line totals to cents', () => {
    const s = buildSection('Striping & Signage', [makeItem({ quantity: 9583, unitPrice: 0.9 })]);
    expect(s.items[0].total).toBe(8624.7);
  });
});

describe('aggregateEstimate', () => {
  it('emits eight sections in fixed order', () => {
    const est = makeEstimate();
    expect(est.sections.map((s) => s.category)).toEqual([
      'Earthwork',
      'Erosion Control',
      'Storm Drainage',
      'Sanitary Sewer',
      'Water',
      'Paving & Concrete',
      'Striping & Signage',
      'Fencing & Misc',
    ]);
  });

  it('grand total is the sum of subtotals', () => {
    const est = makeEstimate();
    // 4500 + 12000 + 13750
    expect(est.grandTotal).toBe(30250);
    expect(est.sections.reduce((s, sec) => s + sec.subtotal, 0)).toBe(est.grandTotal);
  });

  it('per-lot and per-acre costs', () => {
    const est = makeEstimate();
    // 20 ac -> 10.4 net ac -> floor(453024 / 10000) = 45 lots
    expect(est.allocation.lotCount).toBe(45);
    expect(est.costPerLot).toBeCloseTo(30250 / 45, 8);
    expect(est.costPerAcre).toBe(1512.5);
  });

  it('cost per lot is null when no lots fit', () => {
    const site = { ...SITE, grossAcres: 0.5, targetLotSizeSqFt: 43560 };
    const est = aggregateEstimate({ name: '', location: '', preparedBy: '', date: '' }, site, computeAllocation(site), {});
    expect(est.allocation.lotCount).toBe(0);
    expect(est.costPerLot).toBeNull();
    expect(est.grandTotal).toBe(0);
  });
});

describe('updateLineItem', () => {
  it('updates quantity and refreshes subtotal and grand total', () => {
    const next = updateLineItem(makeEstimate(), 'Water', 'W-1', { quantity: 200 });
    const water = next.sections.find((s) => s.category === 'Water');
    expect(water?.items[0].total).toBe(9000);
    expect(water?.subtotal).toBe(21000);
    expect(next.grandTotal).toBe(34750);
  });

  it('updates unit price', () => {
    const next = updateLineItem(makeEstimate(), 'Earthwork', 'EW-1', { unitPrice: 6000 });
    expect(next.sections[0].subtotal).toBe(15000);
    expect(next.grandTotal).toBe(31500);
  });

  it('does not mutate the original estimate', () => {
    const est = makeEstimate();
    updateLineItem(est, 'Water', 'W-1', { quantity: 1 });
    expect(est.grandTotal).toBe(30250);
  });

  it('rejects negative values', () => {
    expect(() => updateLineItem(makeEstimate(), 'Water', 'W-1', { quantity: -1 })).toThrow(EstimateInputError);
    expect(() => updateLineItem(makeEstimate(), 'Water', 'W-1', { unitPrice: Number.NaN })).toThrow(EstimateInputError);
  });

  it('rejects unknown item codes', () => {
    expect(() => updateLineItem(makeEstimate(), 'Water', 'W-99', { quantity: 1 })).toThrow('No line item W-99 in Water');
  });
});

describe('categoryTotals', () => {
  it('maps every category to its subtotal', () => {
    const totals = categoryTotals(makeEstimate());
    expect(totals.Water).toBe(16500);
    expect(totals.Earthwork).toBe(13750);
    expect(totals['Fencing & Misc']).toBe(0);
  });
});

describe('roundCents', () => {
  it('rounds to two decimals', () => {
    expect(roundCents(12.345)).toBe(12.35);
    expect(roundCents(0.1 + 0.2)).toBe(0.3);
  });
});
