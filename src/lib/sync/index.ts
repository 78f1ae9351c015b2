export {
  createSession,
  regenerateEstimate,
  updateSiteParameters,
  editLineItem,
  updateProformaInputs,
  updateProjectInfo,
  setPricePolicy,
  pendingOverwrites,
  DEFAULT_SITE,
  DEFAULT_PROJECT_INFO,
  DEFAULT_SESSION_OPTIONS,
  MIRRORED_FIELDS,
} from './session';
export type { SessionInit } from './session';
