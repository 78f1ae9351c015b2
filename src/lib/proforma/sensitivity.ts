import type { ProformaInputs, ProformaResult, ProformaSensitivityRow } from '../../types/proforma';
import { mapCategories } from '../estimate/categories';
import { computeProforma } from './proforma';

interface Shock {
  parameter: string;
  change: string;
  apply: (inputs: ProformaInputs) => ProformaInputs;
}

const FACTORS = [
  { label: '+10%', factor: 1.1 },
  { label: '-10%', factor: 0.9 },
];

const PARAMETERS: { parameter: string; apply: (i: ProformaInputs, factor: number) => ProformaInputs }[] = [
  { parameter: 'Lot Sale Price', apply: (i, f) => ({ ...i, lotSalePrice: i.lotSalePrice * f }) },
  { parameter: 'Hard Costs', apply: (i, f) => ({ ...i, hardCosts: mapCategories((c) => i.hardCosts[c] * f) }) },
  { parameter: 'Land Cost', apply: (i, f) => ({ ...i, landCostPerAcre: i.landCostPerAcre * f }) },
];

const SHOCKS: Shock[] = PARAMETERS.flatMap(({ parameter, apply }) =>
  FACTORS.map(({ label, factor }) => ({
    parameter,
    change: `${label} ${parameter}`,
    apply: (i: ProformaInputs) => apply(i, factor),
  })),
);

function delta(a: number | null, b: number | null): number | null {
  return a === null || b === null ? null : b - a;
}

export function runProformaSensitivity(
  baseInputs: ProformaInputs,
  baseResult: ProformaResult = computeProforma(baseInputs),
): ProformaSensitivityRow[] {
  return SHOCKS.map((shock) => {
    const next = computeProforma(shock.apply(baseInputs));
    return {
      parameter: shock.parameter,
      change: shock.change,
      baseROI: baseResult.roiPct,
      newROI: next.roiPct,
      roiDelta: delta(baseResult.roiPct, next.roiPct),
      baseProfit: baseResult.grossProfit,
      newProfit: next.grossProfit,
      profitDelta: next.grossProfit - baseResult.grossProfit,
    };
  });
}
