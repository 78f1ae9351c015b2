import type {
  Estimate,
  EstimateCategory,
  LineItemPatch,
  PricePolicy,
  ProjectInfo,
  SiteParameters,
} from '../../types/estimate';
import { ESTIMATE_CATEGORIES } from '../../types/estimate';
import type { ProformaInputs, ProformaInputsPatch } from '../../types/proforma';
import type { MirroredField, SessionOptions, SessionState, SyncOutcome } from '../../types/session';
import { computeAllocation } from '../allocation';
import { isEstimateInputError, requireOneOf } from '../errors';
import { aggregateEstimate, categoryTotals, expandQuantities, updateLineItem } from '../estimate';
import { computeProforma, DEFAULT_PROFORMA_ASSUMPTIONS } from '../proforma';
import type { ProformaAssumptions } from '../proforma';

export const DEFAULT_SITE: SiteParameters = {
  grossAcres: 50,
  targetLotSizeSqFt: 8000,
  sewerType: 'public',
  hasSidewalk: true,
  curbType: 'standard',
};

export const DEFAULT_PROJECT_INFO: ProjectInfo = {
  name: 'New Subdivision',
  location: '',
  preparedBy: '',
  date: '',
};

export const DEFAULT_SESSION_OPTIONS: SessionOptions = { pricePolicy: 'preserve' };

export const MIRRORED_FIELDS: MirroredField[] = [
  'acres',
  'lotCount',
  ...ESTIMATE_CATEGORIES.map((c): MirroredField => `hardCosts.${c}`),
];

export interface SessionInit {
  projectInfo?: Partial<ProjectInfo>;
  site?: Partial<SiteParameters>;
  options?: Partial<SessionOptions>;
  assumptions?: Partial<ProformaAssumptions>;
}

interface Step {
  state: SessionState;
  overwritten: MirroredField[];
}

function buildEstimate(
  projectInfo: ProjectInfo,
  site: SiteParameters,
  pricePolicy: PricePolicy,
  priceOverrides: Record<string, number>,
): Estimate {
  const allocation = computeAllocation(site);
  const items = expandQuantities(allocation, site, { pricePolicy, priceOverrides });
  return aggregateEstimate(projectInfo, site, allocation, items);
}

/** Full re-expansion. Under 'reset' the remembered prices are dropped with the edits. */
function regenerate(state: SessionState, site: SiteParameters): Step {
  const estimate = buildEstimate(state.projectInfo, site, state.options.pricePolicy, state.priceOverrides);
  const priceOverrides = state.options.pricePolicy === 'reset' ? {} : state.priceOverrides;
  return syncFromEstimate({ ...state, priceOverrides }, estimate);
}

function mirroredValue(field: MirroredField, estimate: Estimate, totals: Record<EstimateCategory, number>): number {
  if (field === 'acres') return estimate.site.grossAcres;
  if (field === 'lotCount') return estimate.allocation.lotCount;
  const category = ESTIMATE_CATEGORIES.find((c) => field === `hardCosts.${c}`);
  return category ? totals[category] : 0;
}

function inputValue(field: MirroredField, inputs: ProformaInputs): number {
  if (field === 'acres') return inputs.acres;
  if (field === 'lotCount') return inputs.lotCount;
  const category = ESTIMATE_CATEGORIES.find((c) => field === `hardCosts.${c}`);
  return category ? inputs.hardCosts[category] : 0;
}

function mirror(inputs: Omit<ProformaInputs, 'acres' | 'lotCount' | 'hardCosts'>, estimate: Estimate): ProformaInputs {
  return {
    ...inputs,
    acres: estimate.site.grossAcres,
    lotCount: estimate.allocation.lotCount,
    hardCosts: categoryTotals(estimate),
  };
}

/**
 * Push estimate-derived figures into the pro forma and rerun it.
 * Every override the user typed is replaced; the replaced fields are reported.
 */
function syncFromEstimate(state: SessionState, estimate: Estimate): Step {
  const overwritten = [...state.overriddenFields];
  if (overwritten.length > 0) {
    console.warn(`[sync] Overwrote ${overwritten.length} pro forma override(s): ${overwritten.join(', ')}`);
  }
  const proformaInputs = mirror(state.proformaInputs, estimate);
  return {
    state: {
      ...state,
      projectInfo: estimate.projectInfo,
      site: estimate.site,
      estimate,
      proformaInputs,
      proforma: computeProforma(proformaInputs),
      overriddenFields: [],
    },
    overwritten,
  };
}

function attempt(state: SessionState, label: string, run: () => Step): SyncOutcome {
  try {
    return { ok: true, ...run() };
  } catch (err) {
    if (isEstimateInputError(err)) {
      console.warn(`[sync] Rejected ${label}: ${err.message}`);
      return { ok: false, state, error: err };
    }
    throw err;
  }
}

export function createSession(init: SessionInit = {}): SessionState {
  const projectInfo: ProjectInfo = { ...DEFAULT_PROJECT_INFO, ...init.projectInfo };
  const site: SiteParameters = { ...DEFAULT_SITE, ...init.site };
  const options: SessionOptions = { ...DEFAULT_SESSION_OPTIONS, ...init.options };
  requireOneOf(options.pricePolicy, ['preserve', 'reset'] as const, 'pricePolicy');

  const estimate = buildEstimate(projectInfo, site, options.pricePolicy, {});
  const proformaInputs = mirror({ ...DEFAULT_PROFORMA_ASSUMPTIONS, ...init.assumptions }, estimate);

  return {
    projectInfo,
    site,
    options,
    estimate,
    proformaInputs,
    proforma: computeProforma(proformaInputs),
    priceOverrides: {},
    overriddenFields: [],
  };
}

export function regenerateEstimate(state: SessionState): SyncOutcome {
  return attempt(state, 'regeneration', () => regenerate(state, state.site));
}

export function updateSiteParameters(state: SessionState, patch: Partial<SiteParameters>): SyncOutcome {
  return attempt(state, 'site parameter change', () => regenerate(state, { ...state.site, ...patch }));
}

export function editLineItem(
  state: SessionState,
  category: EstimateCategory,
  code: string,
  patch: LineItemPatch,
): SyncOutcome {
  return attempt(state, `edit of ${code}`, () => {
    const estimate = updateLineItem(state.estimate, category, code, patch);
    const priceOverrides =
      patch.unitPrice === undefined ? state.priceOverrides : { ...state.priceOverrides, [code]: patch.unitPrice };
    return syncFromEstimate({ ...state, priceOverrides }, estimate);
  });
}

/**
 * Edits pro forma inputs without touching the estimate. A mirrored field set
 * to something other than its estimate-derived value is tracked as an override
 * until the next sync replaces it.
 */
export function updateProformaInputs(state: SessionState, patch: ProformaInputsPatch): SyncOutcome {
  return attempt(state, 'pro forma edit', () => {
    const { hardCosts, softCosts, ...scalars } = patch;
    const proformaInputs: ProformaInputs = {
      ...state.proformaInputs,
      ...scalars,
      hardCosts: { ...state.proformaInputs.hardCosts, ...hardCosts },
      softCosts: { ...state.proformaInputs.softCosts, ...softCosts },
    };
    const proforma = computeProforma(proformaInputs);

    const totals = categoryTotals(state.estimate);
    const overriddenFields = MIRRORED_FIELDS.filter(
      (f) => inputValue(f, proformaInputs) !== mirroredValue(f, state.estimate, totals),
    );

    return {
      state: { ...state, proformaInputs, proforma, overriddenFields },
      overwritten: [],
    };
  });
}

export function updateProjectInfo(state: SessionState, patch: Partial<ProjectInfo>): SyncOutcome {
  const projectInfo: ProjectInfo = { ...state.projectInfo, ...patch };
  return {
    ok: true,
    state: { ...state, projectInfo, estimate: { ...state.estimate, projectInfo } },
    overwritten: [],
  };
}

/** Takes effect on the next regeneration; current prices are left alone. */
export function setPricePolicy(state: SessionState, pricePolicy: PricePolicy): SyncOutcome {
  return attempt(state, 'price policy change', () => ({
    state: {
      ...state,
      options: { ...state.options, pricePolicy: requireOneOf(pricePolicy, ['preserve', 'reset'] as const, 'pricePolicy') },
    },
    overwritten: [],
  }));
}

export function pendingOverwrites(state: SessionState): MirroredField[] {
  return [...state.overriddenFields];
}
