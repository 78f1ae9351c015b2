import type { SessionOptions, SessionState } from '../../types/session';
import { createSession } from '../sync';
import type { SessionInit } from '../sync';

export const EXAMPLE_PROJECT: SessionInit = {
  projectInfo: {
    name: 'Example Subdivision',
    location: 'Sample County',
    preparedBy: 'Estimator',
    date: '2026-01-15',
  },
  site: {
    grossAcres: 50,
    targetLotSizeSqFt: 8000,
    sewerType: 'public',
    hasSidewalk: true,
    curbType: 'standard',
  },
  assumptions: {
    lotSalePrice: 60_000,
    landCostPerAcre: 20_000,
    softCosts: { engineering: 350_000, permits: 120_000, legal: 40_000, marketing: 60_000 },
    salesCommissionPct: 6,
    loanRatePct: 8,
    devMonths: 18,
    salesMonths: 24,
    lotsPerMonth: 6,
  },
};

/** 50 ac / 8,000 SF lots / public sewer, with sidewalks and standard curb. */
export function loadExampleProject(options: Partial<SessionOptions> = {}): SessionState {
  return createSession({ ...EXAMPLE_PROJECT, options });
}
