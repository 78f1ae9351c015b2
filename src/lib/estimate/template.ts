import type { EstimateCategory, EstimateTemplate, TemplateItem } from '../../types/estimate';
import { ESTIMATE_CATEGORIES } from '../../types/estimate';
import { EstimateInputError } from '../errors';
import { mapCategories } from './categories';
import defaultSections from './defaultSections.json';

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function parseItem(raw: unknown, category: EstimateCategory, index: number): TemplateItem {
  const where = `template.${category}[${index}]`;
  if (!isObject(raw)) {
    throw new EstimateInputError('InvalidInput', where, `${where} must be an object`);
  }
  const { code, name, unit, defaultUnitPrice } = raw;
  if (typeof code !== 'string' || code.trim() === '') {
    throw new EstimateInputError('InvalidInput', `${where}.code`, `${where} is missing an item code`);
  }
  if (typeof name !== 'string' || typeof unit !== 'string') {
    throw new EstimateInputError('InvalidInput', where, `${where} needs a name and a unit`);
  }
  if (typeof defaultUnitPrice !== 'number' || !Number.isFinite(defaultUnitPrice) || defaultUnitPrice < 0) {
    throw new EstimateInputError(
      'InvalidInput',
      `${where}.defaultUnitPrice`,
      `${where} default unit price must be zero or greater`,
    );
  }
  return { code: code.trim(), name, unit, defaultUnitPrice };
}

/**
 * Validate a category -> items mapping. Every category must be present and
 * item codes are unique across the whole template.
 */
export function parseTemplate(raw: unknown): EstimateTemplate {
  if (!isObject(raw)) {
    throw new EstimateInputError('InvalidInput', 'template', 'Template must be an object keyed by category');
  }

  for (const key of Object.keys(raw)) {
    if (!ESTIMATE_CATEGORIES.some((c) => c === key)) {
      throw new EstimateInputError('InvalidEnum', 'template', `Unknown estimate category "${key}"`);
    }
  }

  const seen = new Set<string>();
  return mapCategories((category) => {
    const items = raw[category];
    if (!Array.isArray(items)) {
      throw new EstimateInputError('InvalidInput', `template.${category}`, `Template is missing category "${category}"`);
    }
    return items.map((item: unknown, i) => {
      const parsed = parseItem(item, category, i);
      if (seen.has(parsed.code)) {
        throw new EstimateInputError('InvalidInput', `template.${category}`, `Duplicate item code ${parsed.code}`);
      }
      seen.add(parsed.code);
      return parsed;
    });
  });
}

export function getDefaultTemplate(): EstimateTemplate {
  return parseTemplate(defaultSections);
}
