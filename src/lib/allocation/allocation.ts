import type { AllocationResult, SiteParameters } from '../../types/estimate';
import { requirePositive } from '../errors';

export const SQFT_PER_ACRE = 43560;

// Whole percents; net developable is the complement.
export const ROADS_PCT = 22;
export const OPEN_SPACE_PCT = 15;
export const DETENTION_PCT = 7;
export const BUFFERS_PCT = 4;
export const NET_DEVELOPABLE_PCT = 100 - (ROADS_PCT + OPEN_SPACE_PCT + DETENTION_PCT + BUFFERS_PCT);

function acresAt(grossAcres: number, pct: number): number {
  return (grossAcres * pct) / 100;
}

export function calcLotCount(netDevelopableAcres: number, targetLotSizeSqFt: number): number {
  if (netDevelopableAcres <= 0 || targetLotSizeSqFt <= 0) return 0;
  return Math.floor((netDevelopableAcres * SQFT_PER_ACRE) / targetLotSizeSqFt);
}

export function computeAllocation(
  site: Pick<SiteParameters, 'grossAcres' | 'targetLotSizeSqFt'>,
): AllocationResult {
  const grossAcres = requirePositive(site.grossAcres, 'grossAcres');
  const targetLotSizeSqFt = requirePositive(site.targetLotSizeSqFt, 'targetLotSizeSqFt');

  const netDevelopableAcres = acresAt(grossAcres, NET_DEVELOPABLE_PCT);

  return {
    roadsPct: ROADS_PCT,
    openSpacePct: OPEN_SPACE_PCT,
    detentionPct: DETENTION_PCT,
    buffersPct: BUFFERS_PCT,
    netDevelopablePct: NET_DEVELOPABLE_PCT,
    roadsAcres: acresAt(grossAcres, ROADS_PCT),
    openSpaceAcres: acresAt(grossAcres, OPEN_SPACE_PCT),
    detentionAcres: acresAt(grossAcres, DETENTION_PCT),
    buffersAcres: acresAt(grossAcres, BUFFERS_PCT),
    netDevelopableAcres,
    lotCount: calcLotCount(netDevelopableAcres, targetLotSizeSqFt),
  };
}
