import { describe, it, expect } from 'vitest';
import { runProformaSensitivity } from '../sensitivity';
import { computeProforma, DEFAULT_PROFORMA_ASSUMPTIONS } from '../proforma';
import type { ProformaInputs } from '../../../types/proforma';

function makeInput(overrides: Partial<ProformaInputs> = {}): ProformaInputs {
  return {
    ...DEFAULT_PROFORMA_ASSUMPTIONS,
    acres: 50,
    lotCount: 141,
    hardCosts: {
      Earthwork: 806517.6,
      'Erosion Control': 157689.5,
      'Storm Drainage': 1389977,
      'Sanitary Sewer': 646220,
      Water: 744935,
      'Paving & Concrete': 2844404,
      'Striping & Signage': 33424.7,
      'Fencing & Misc': 45236,
    },
    ...overrides,
  };
}

describe('runProformaSensitivity', () => {
  it('six shocks, up then down per parameter', () => {
    const rows = runProformaSensitivity(makeInput());
    expect(rows.map((r) => r.change)).toEqual([
      '+10% Lot Sale Price',
      '-10% Lot Sale Price',
      '+10% Hard Costs',
      '-10% Hard Costs',
      '+10% Land Cost',
      '-10% Land Cost',
    ]);
  });

  it('lot price shock moves profit by 10% of net revenue', () => {
    const [up, down] = runProformaSensitivity(makeInput());
    // 141 * 6,000 * 0.94
    expect(up.profitDelta).toBeCloseTo(795_240, 4);
    expect(down.profitDelta).toBeCloseTo(-795_240, 4);
    expect(up.newProfit).toBeCloseTo(14931.972, 4);
  });

  it('hard cost shock carries interest', () => {
    const rows = runProformaSensitivity(makeInput());
    // 666,840.38 plus 6% interest on it
    expect(rows[2].profitDelta).toBeCloseTo(-706850.8028, 4);
  });

  it('land cost shock', () => {
    const rows = runProformaSensitivity(makeInput());
    expect(rows[4].profitDelta).toBeCloseTo(-106_000, 4);
    expect(rows[5].profitDelta).toBeCloseTo(106_000, 4);
  });

  it('reports base figures and ROI deltas', () => {
    const base = computeProforma(makeInput());
    const rows = runProformaSensitivity(makeInput(), base);
    for (const row of rows) {
      expect(row.baseROI).toBe(base.roiPct);
      expect(row.baseProfit).toBe(base.grossProfit);
      expect(row.roiDelta).toBeCloseTo((row.newROI ?? 0) - (base.roiPct ?? 0), 10);
    }
  });

  it('ROI delta is null when ROI is undefined', () => {
    const zeroCosts = makeInput({
      landCostPerAcre: 0,
      softCosts: { engineering: 0, permits: 0, legal: 0, marketing: 0 },
      hardCosts: {
        Earthwork: 0,
        'Erosion Control': 0,
        'Storm Drainage': 0,
        'Sanitary Sewer': 0,
        Water: 0,
        'Paving & Concrete': 0,
        'Striping & Signage': 0,
        'Fencing & Misc': 0,
      },
    });
    const rows = runProformaSensitivity(zeroCosts);
    expect(rows[0].roiDelta).toBeNull();
    expect(rows[0].newROI).toBeNull();
  });
});
