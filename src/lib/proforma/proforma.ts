import type { ProformaInputs, ProformaResult, SoftCosts } from '../../types/proforma';
import { ESTIMATE_CATEGORIES } from '../../types/estimate';
import { requireNonNegative } from '../errors';
import { roundCents } from '../estimate/aggregate';

export type ProformaAssumptions = Omit<ProformaInputs, 'acres' | 'lotCount' | 'hardCosts'>;

export const DEFAULT_SOFT_COSTS: SoftCosts = {
  engineering: 350_000,
  permits: 120_000,
  legal: 40_000,
  marketing: 60_000,
};

export const DEFAULT_PROFORMA_ASSUMPTIONS: ProformaAssumptions = {
  lotSalePrice: 60_000,
  landCostPerAcre: 20_000,
  softCosts: DEFAULT_SOFT_COSTS,
  salesCommissionPct: 6,
  loanRatePct: 8,
  devMonths: 18,
  salesMonths: 24,
  lotsPerMonth: 6,
};

const SCALAR_FIELDS = [
  'acres',
  'lotCount',
  'lotSalePrice',
  'landCostPerAcre',
  'salesCommissionPct',
  'loanRatePct',
  'devMonths',
  'salesMonths',
  'lotsPerMonth',
] as const;

const SOFT_COST_FIELDS = ['engineering', 'permits', 'legal', 'marketing'] as const;

export function validateProformaInputs(inputs: ProformaInputs): ProformaInputs {
  for (const field of SCALAR_FIELDS) requireNonNegative(inputs[field], field);
  for (const c of ESTIMATE_CATEGORIES) requireNonNegative(inputs.hardCosts[c], `hardCosts.${c}`);
  for (const f of SOFT_COST_FIELDS) requireNonNegative(inputs.softCosts[f], `softCosts.${f}`);
  return inputs;
}

function ratio(numerator: number, denominator: number): number | null {
  return denominator === 0 ? null : numerator / denominator;
}

function pct(numerator: number, denominator: number): number | null {
  const r = ratio(numerator, denominator);
  return r === null ? null : r * 100;
}

export function computeProforma(inputs: ProformaInputs): ProformaResult {
  validateProformaInputs(inputs);

  const landAcquisition = inputs.acres * inputs.landCostPerAcre;
  // same summation and rounding as Estimate.grandTotal
  const hardCostTotal = roundCents(ESTIMATE_CATEGORIES.reduce((s, c) => s + inputs.hardCosts[c], 0));
  const softCostTotal = SOFT_COST_FIELDS.reduce((s, f) => s + inputs.softCosts[f], 0);
  const totalDevCostPreInterest = landAcquisition + hardCostTotal + softCostTotal;

  // Average outstanding balance is half the cost, carried for the dev period.
  const constructionInterest =
    (totalDevCostPreInterest / 2) * (inputs.loanRatePct / 100 / 12) * inputs.devMonths;
  const totalDevCost = totalDevCostPreInterest + constructionInterest;

  const grossRevenue = inputs.lotCount * inputs.lotSalePrice;
  const salesCommission = (grossRevenue * inputs.salesCommissionPct) / 100;
  const netRevenue = grossRevenue - salesCommission;
  const grossProfit = netRevenue - totalDevCost;

  const lots = inputs.lotCount;

  return {
    landAcquisition,
    hardCostTotal,
    softCostTotal,
    totalDevCostPreInterest,
    constructionInterest,
    totalDevCost,
    grossRevenue,
    salesCommission,
    netRevenue,
    grossProfit,
    profitMarginPct: pct(grossProfit, grossRevenue),
    roiPct: pct(grossProfit, totalDevCost),
    costPerLot: ratio(totalDevCost, lots),
    profitPerLot: ratio(grossProfit, lots),
    hardCostPerLot: ratio(hardCostTotal, lots),
    landCostPerLot: ratio(landAcquisition, lots),
    absorptionMonths: inputs.lotsPerMonth > 0 && lots > 0 ? Math.ceil(lots / inputs.lotsPerMonth) : null,
    totalDurationMonths: inputs.devMonths + inputs.salesMonths,
  };
}
