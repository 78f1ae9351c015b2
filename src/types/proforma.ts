import type { EstimateCategory } from './estimate';

export interface SoftCosts {
  engineering: number;
  permits: number;
  legal: number;
  marketing: number;
}

export type HardCosts = Record<EstimateCategory, number>;

export interface ProformaInputs {
  acres: number;
  lotCount: number;
  lotSalePrice: number;
  landCostPerAcre: number;
  hardCosts: HardCosts;
  softCosts: SoftCosts;
  /** whole percent, 6 = 6% */
  salesCommissionPct: number;
  /** annual, whole percent */
  loanRatePct: number;
  devMonths: number;
  salesMonths: number;
  lotsPerMonth: number;
}

export interface ProformaResult {
  landAcquisition: number;
  hardCostTotal: number;
  softCostTotal: number;
  totalDevCostPreInterest: number;
  constructionInterest: number;
  totalDevCost: number;
  grossRevenue: number;
  salesCommission: number;
  netRevenue: number;
  grossProfit: number;
  profitMarginPct: number | null;
  roiPct: number | null;
  costPerLot: number | null;
  profitPerLot: number | null;
  hardCostPerLot: number | null;
  landCostPerLot: number | null;
  absorptionMonths: number | null;
  totalDurationMonths: number;
}

export interface ProformaSensitivityRow {
  parameter: string;
  change: string;
  baseROI: number | null;
  newROI: number | null;
  roiDelta: number | null;
  baseProfit: number;
  newProfit: number;
  profitDelta: number;
}

export type ProformaInputsPatch = Partial<Omit<ProformaInputs, 'hardCosts' | 'softCosts'>> & {
  hardCosts?: Partial<HardCosts>;
  softCosts?: Partial<SoftCosts>;
};
