export { getDefaultTemplate, parseTemplate } from './template';
export { expandQuantities } from './expandQuantities';
export type { ExpandOptions, ExpandedItems } from './expandQuantities';
export { deriveSiteGeometry, roundQuantity, QUANTITY_RULES } from './quantityRules';
export type { QuantityContext, QuantityRule, SiteGeometry } from './quantityRules';
export { aggregateEstimate, buildSection, categoryTotals, roundCents, updateLineItem } from './aggregate';
export { mapCategories } from './categories';
