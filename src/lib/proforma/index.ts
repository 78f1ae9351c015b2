export {
  computeProforma,
  validateProformaInputs,
  DEFAULT_PROFORMA_ASSUMPTIONS,
  DEFAULT_SOFT_COSTS,
} from './proforma';
export type { ProformaAssumptions } from './proforma';
export { runProformaSensitivity } from './sensitivity';
