export type SewerType = 'public' | 'septic';

export type CurbType = 'standard' | 'rolled' | 'none';

export const SEWER_TYPES: SewerType[] = ['public', 'septic'];

export const CURB_TYPES: CurbType[] = ['standard', 'rolled', 'none'];

export const ESTIMATE_CATEGORIES = [
  'Earthwork',
  'Erosion Control',
  'Storm Drainage',
  'Sanitary Sewer',
  'Water',
  'Paving & Concrete',
  'Striping & Signage',
  'Fencing & Misc',
] as const;

export type EstimateCategory = (typeof ESTIMATE_CATEGORIES)[number];

export interface SiteParameters {
  grossAcres: number;
  targetLotSizeSqFt: number;
  sewerType: SewerType;
  hasSidewalk: boolean;
  curbType: CurbType;
}

export interface ProjectInfo {
  name: string;
  location: string;
  preparedBy: string;
  date: string;
}

export interface AllocationResult {
  roadsPct: number;
  openSpacePct: number;
  detentionPct: number;
  buffersPct: number;
  netDevelopablePct: number;
  roadsAcres: number;
  openSpaceAcres: number;
  detentionAcres: number;
  buffersAcres: number;
  netDevelopableAcres: number;
  lotCount: number;
}

export interface TemplateItem {
  code: string;
  name: string;
  unit: string;
  defaultUnitPrice: number;
}

export type EstimateTemplate = Record<EstimateCategory, TemplateItem[]>;

export interface LineItem {
  category: EstimateCategory;
  code: string;
  name: string;
  quantity: number;
  unit: string;
  unitPrice: number;
  total: number;
}

export interface Section {
  category: EstimateCategory;
  items: LineItem[];
  subtotal: number;
}

export interface Estimate {
  projectInfo: ProjectInfo;
  site: SiteParameters;
  allocation: AllocationResult;
  sections: Section[];
  grandTotal: number;
  costPerLot: number | null;
  costPerAcre: number | null;
}

/**
 * What happens to edited unit prices when quantities are regenerated.
 * - preserve => a price the user changed is kept (matched by item code)
 * - reset    => every price returns to the template default
 */
export type PricePolicy = 'preserve' | 'reset';

export interface LineItemPatch {
  quantity?: number;
  unitPrice?: number;
}
