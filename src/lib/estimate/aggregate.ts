import type {
  AllocationResult,
  Estimate,
  EstimateCategory,
  LineItem,
  LineItemPatch,
  ProjectInfo,
  Section,
  SiteParameters,
} from '../../types/estimate';
import { ESTIMATE_CATEGORIES } from '../../types/estimate';
import { EstimateInputError, requireNonNegative } from '../errors';
import { mapCategories } from './categories';

export function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

function lineTotal(quantity: number, unitPrice: number): number {
  return roundCents(quantity * unitPrice);
}

function sumTotals(values: number[]): number {
  return roundCents(values.reduce((s, v) => s + v, 0));
}

export function buildSection(category: EstimateCategory, items: LineItem[]): Section {
  const priced = items.map((item) => ({ ...item, category, total: lineTotal(item.quantity, item.unitPrice) }));
  return {
    category,
    items: priced,
    subtotal: sumTotals(priced.map((i) => i.total)),
  };
}

function withTotals(
  base: Pick<Estimate, 'projectInfo' | 'site' | 'allocation'>,
  sections: Section[],
): Estimate {
  const grandTotal = sumTotals(sections.map((s) => s.subtotal));
  const { lotCount } = base.allocation;
  const { grossAcres } = base.site;
  return {
    ...base,
    sections,
    grandTotal,
    costPerLot: lotCount > 0 ? grandTotal / lotCount : null,
    costPerAcre: grossAcres > 0 ? grandTotal / grossAcres : null,
  };
}

/**
 * Sections come back in the fixed category order regardless of input order;
 * a category with no items still gets an empty section.
 */
export function aggregateEstimate(
  projectInfo: ProjectInfo,
  site: SiteParameters,
  allocation: AllocationResult,
  itemsByCategory: Partial<Record<EstimateCategory, LineItem[]>>,
): Estimate {
  const sections = ESTIMATE_CATEGORIES.map((c) => buildSection(c, itemsByCategory[c] ?? []));
  return withTotals({ projectInfo, site, allocation }, sections);
}

export function updateLineItem(
  estimate: Estimate,
  category: EstimateCategory,
  code: string,
  patch: LineItemPatch,
): Estimate {
  if (patch.quantity !== undefined) requireNonNegative(patch.quantity, `${code}.quantity`);
  if (patch.unitPrice !== undefined) requireNonNegative(patch.unitPrice, `${code}.unitPrice`);

  const section = estimate.sections.find((s) => s.category === category);
  if (!section || !section.items.some((i) => i.code === code)) {
    throw new EstimateInputError('InvalidInput', 'code', `No line item ${code} in ${category}`);
  }

  const sections = estimate.sections.map((s) => {
    if (s !== section) return s;
    return buildSection(
      category,
      s.items.map((item) =>
        item.code === code
          ? {
              ...item,
              quantity: patch.quantity ?? item.quantity,
              unitPrice: patch.unitPrice ?? item.unitPrice,
            }
          : item,
      ),
    );
  });

  return withTotals(estimate, sections);
}

export function categoryTotals(estimate: Estimate): Record<EstimateCategory, number> {
  return mapCategories((category) => estimate.sections.find((s) => s.category === category)?.subtotal ?? 0);
}
