import type {
  AllocationResult,
  EstimateCategory,
  EstimateTemplate,
  LineItem,
  PricePolicy,
  SiteParameters,
} from '../../types/estimate';
import { CURB_TYPES, SEWER_TYPES } from '../../types/estimate';
import { requireOneOf } from '../errors';
import { mapCategories } from './categories';
import { getDefaultTemplate } from './template';
import { QUANTITY_RULES, deriveSiteGeometry, roundQuantity } from './quantityRules';
import type { QuantityContext } from './quantityRules';

export interface ExpandOptions {
  template?: EstimateTemplate;
  pricePolicy?: PricePolicy;
  /** edited unit prices by item code, applied under 'preserve' */
  priceOverrides?: Readonly<Partial<Record<string, number>>>;
}

export type ExpandedItems = Record<EstimateCategory, LineItem[]>;

export function expandQuantities(
  allocation: AllocationResult,
  site: SiteParameters,
  options: ExpandOptions = {},
): ExpandedItems {
  const sewerType = requireOneOf(site.sewerType, SEWER_TYPES, 'sewerType');
  const curbType = requireOneOf(site.curbType, CURB_TYPES, 'curbType');
  const pricePolicy = requireOneOf(options.pricePolicy ?? 'preserve', ['preserve', 'reset'] as const, 'pricePolicy');

  const template = options.template ?? getDefaultTemplate();
  const kept: Readonly<Partial<Record<string, number>>> =
    pricePolicy === 'preserve' ? (options.priceOverrides ?? {}) : {};

  const checkedSite: SiteParameters = { ...site, sewerType, curbType };
  const ctx: QuantityContext = {
    site: checkedSite,
    allocation,
    geometry: deriveSiteGeometry(checkedSite, allocation),
  };

  return mapCategories((category) => {
    const items: LineItem[] = [];
    for (const t of template[category]) {
      const rule = QUANTITY_RULES[t.code];
      if (rule?.include && !rule.include(ctx)) continue;

      // items without a rule (custom template rows) start at zero for manual entry
      const quantity = rule ? roundQuantity(rule.quantity(ctx), t.unit) : 0;
      const unitPrice = kept[t.code] ?? t.defaultUnitPrice;
      items.push({
        category,
        code: t.code,
        name: t.name,
        quantity,
        unit: t.unit,
        unitPrice,
        total: quantity * unitPrice,
      });
    }
    return items;
  });
}
