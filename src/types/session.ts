import type { Estimate, EstimateCategory, PricePolicy, ProjectInfo, SiteParameters } from './estimate';
import type { ProformaInputs, ProformaResult } from './proforma';
import type { EstimateInputError } from '../lib/errors';

export type MirroredField = 'acres' | 'lotCount' | `hardCosts.${EstimateCategory}`;

export interface SessionOptions {
  pricePolicy: PricePolicy;
}

export interface SessionState {
  projectInfo: ProjectInfo;
  site: SiteParameters;
  options: SessionOptions;
  estimate: Estimate;
  proformaInputs: ProformaInputs;
  proforma: ProformaResult;
  /** unit prices the user edited, by item code; outlives items dropped by a regeneration */
  priceOverrides: Record<string, number>;
  /** mirrored pro forma fields the user has typed over since the last sync */
  overriddenFields: MirroredField[];
}

export type SyncOutcome =
  | { ok: true; state: SessionState; overwritten: MirroredField[] }
  | { ok: false; state: SessionState; error: EstimateInputError };
