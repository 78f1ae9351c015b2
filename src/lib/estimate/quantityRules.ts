import type { AllocationResult, SiteParameters } from '../../types/estimate';
import { SQFT_PER_ACRE } from '../allocation';

// Site standards (feet unless noted)
export const ROW_WIDTH_FT = 50;
export const PAVEMENT_WIDTH_FT = 30;
export const SIDEWALK_WIDTH_FT = 4;
export const HYDRANT_SPACING_FT = 500;
export const INLET_SPACING_FT = 300;
export const MANHOLE_SPACING_FT = 400;
export const VALVE_SPACING_FT = 800;
export const INTERSECTION_SPACING_FT = 600;
export const INLET_LEAD_FT = 40;
export const MASS_GRADING_DEPTH_FT = 1.0;
export const TOPSOIL_DEPTH_FT = 0.5;
export const POND_DEPTH_FT = 4;
export const MAX_POND_ACRES = 5;
export const ACRES_PER_ENTRANCE = 25;
export const HAUL_FRACTION = 0.1;
export const POND_MATTING_FRACTION = 0.25;
export const DRAIN_FIELD_LF_PER_LOT = 300;

const SQFT_PER_SY = 9;
const CUFT_PER_CY = 27;

export interface SiteGeometry {
  roadLengthFt: number;
  pavementSy: number;
  disturbedAcres: number;
  intersections: number;
  inlets: number;
  manholes: number;
  hydrants: number;
  valves: number;
  ponds: number;
  massExcavationCy: number;
}

export interface QuantityContext {
  site: SiteParameters;
  allocation: AllocationResult;
  geometry: SiteGeometry;
}

export interface QuantityRule {
  /** omitted entirely from the estimate when false */
  include?: (ctx: QuantityContext) => boolean;
  quantity: (ctx: QuantityContext) => number;
}

function squarePerimeterFt(acres: number): number {
  return 4 * Math.sqrt(acres * SQFT_PER_ACRE);
}

export function deriveSiteGeometry(site: SiteParameters, allocation: AllocationResult): SiteGeometry {
  const roadLengthFt = (allocation.roadsAcres * SQFT_PER_ACRE) / ROW_WIDTH_FT;
  const disturbedAcres = site.grossAcres - allocation.openSpaceAcres;

  return {
    roadLengthFt,
    pavementSy: (roadLengthFt * PAVEMENT_WIDTH_FT) / SQFT_PER_SY,
    disturbedAcres,
    intersections: Math.ceil(roadLengthFt / INTERSECTION_SPACING_FT),
    inlets: Math.ceil((2 * roadLengthFt) / INLET_SPACING_FT),
    manholes: Math.ceil(roadLengthFt / MANHOLE_SPACING_FT),
    hydrants: Math.ceil(roadLengthFt / HYDRANT_SPACING_FT),
    valves: Math.ceil(roadLengthFt / VALVE_SPACING_FT),
    ponds: Math.max(1, Math.ceil(allocation.detentionAcres / MAX_POND_ACRES)),
    massExcavationCy: (disturbedAcres * SQFT_PER_ACRE * MASS_GRADING_DEPTH_FT) / CUFT_PER_CY,
  };
}

const isPublicSewer = (ctx: QuantityContext) => ctx.site.sewerType === 'public';
const isSeptic = (ctx: QuantityContext) => ctx.site.sewerType === 'septic';

export const QUANTITY_RULES: Partial<Record<string, QuantityRule>> = {
  // Earthwork
  'EW-1': { quantity: ({ geometry }) => geometry.disturbedAcres },
  'EW-2': { quantity: ({ geometry }) => geometry.massExcavationCy },
  'EW-3': {
    quantity: ({ geometry }) => (geometry.disturbedAcres * SQFT_PER_ACRE * TOPSOIL_DEPTH_FT) / CUFT_PER_CY,
  },
  'EW-4': {
    quantity: ({ allocation }) => (allocation.netDevelopableAcres * SQFT_PER_ACRE * TOPSOIL_DEPTH_FT) / CUFT_PER_CY,
  },
  'EW-5': { quantity: ({ geometry }) => geometry.pavementSy },
  'EW-6': { quantity: ({ geometry }) => geometry.pavementSy },
  'EW-7': { quantity: ({ geometry }) => geometry.massExcavationCy * HAUL_FRACTION },

  // Erosion Control
  'EC-1': { quantity: ({ site }) => Math.max(1, Math.ceil(site.grossAcres / ACRES_PER_ENTRANCE)) },
  'EC-2': { quantity: ({ site }) => squarePerimeterFt(site.grossAcres) },
  'EC-3': { quantity: ({ geometry }) => geometry.inlets },
  'EC-4': {
    quantity: ({ allocation }) => ((allocation.detentionAcres * SQFT_PER_ACRE) / SQFT_PER_SY) * POND_MATTING_FRACTION,
  },
  'EC-5': { quantity: ({ geometry }) => geometry.disturbedAcres },
  'EC-6': {
    quantity: ({ allocation }) => allocation.openSpaceAcres + allocation.detentionAcres + allocation.buffersAcres,
  },

  // Storm Drainage
  'SD-1': { quantity: ({ geometry }) => geometry.inlets * INLET_LEAD_FT },
  'SD-2': { quantity: ({ geometry }) => geometry.roadLengthFt * 0.5 },
  'SD-3': { quantity: ({ geometry }) => geometry.roadLengthFt * 0.25 },
  'SD-4': { quantity: ({ geometry }) => geometry.inlets },
  'SD-5': { quantity: ({ geometry }) => geometry.manholes },
  'SD-6': { quantity: ({ geometry }) => geometry.ponds * 2 },
  'SD-7': { quantity: ({ geometry }) => geometry.ponds },
  'SD-8': {
    quantity: ({ allocation }) => (allocation.detentionAcres * SQFT_PER_ACRE * POND_DEPTH_FT) / CUFT_PER_CY,
  },
  'SD-9': { quantity: ({ allocation }) => (allocation.detentionAcres * SQFT_PER_ACRE) / SQFT_PER_SY },

  // Sanitary Sewer: public main, or one septic system per lot
  'SS-1': { include: isPublicSewer, quantity: ({ geometry }) => geometry.roadLengthFt },
  'SS-2': { include: isPublicSewer, quantity: ({ geometry }) => geometry.manholes },
  'SS-3': { include: isPublicSewer, quantity: ({ allocation }) => allocation.lotCount },
  'SS-4': { include: isPublicSewer, quantity: () => 1 },
  'SP-1': { include: isSeptic, quantity: ({ allocation }) => allocation.lotCount },
  'SP-2': { include: isSeptic, quantity: ({ allocation }) => allocation.lotCount * DRAIN_FIELD_LF_PER_LOT },
  'SP-3': { include: isSeptic, quantity: ({ allocation }) => allocation.lotCount },

  // Water
  'W-1': { quantity: ({ geometry }) => geometry.roadLengthFt },
  'W-2': { quantity: ({ geometry }) => geometry.hydrants },
  'W-3': { quantity: ({ geometry }) => geometry.valves },
  'W-4': { quantity: () => 1 },
  'W-5': { quantity: ({ allocation }) => allocation.lotCount },

  // Paving & Concrete
  'PC-1': { quantity: ({ geometry }) => geometry.pavementSy },
  'PC-2': { quantity: ({ geometry }) => geometry.pavementSy },
  'PC-3': {
    include: ({ site }) => site.curbType !== 'rolled',
    quantity: ({ site, geometry }) => (site.curbType === 'none' ? 0 : geometry.roadLengthFt * 2),
  },
  'PC-3R': {
    include: ({ site }) => site.curbType === 'rolled',
    quantity: ({ geometry }) => geometry.roadLengthFt * 2,
  },
  'PC-4': {
    quantity: ({ site, geometry }) => (site.hasSidewalk ? geometry.roadLengthFt * 2 * SIDEWALK_WIDTH_FT : 0),
  },
  'PC-5': { quantity: ({ site, geometry }) => (site.hasSidewalk ? geometry.intersections * 2 : 0) },
  'PC-6': { quantity: ({ allocation }) => allocation.lotCount },

  // Striping & Signage
  'ST-1': { quantity: ({ geometry }) => geometry.roadLengthFt },
  'ST-2': { quantity: ({ geometry }) => geometry.intersections },
  'ST-3': { quantity: ({ geometry }) => geometry.intersections * 2 },
  'ST-4': { quantity: ({ geometry }) => geometry.intersections * 2 },

  // Fencing & Misc
  'FM-1': { quantity: ({ allocation }) => squarePerimeterFt(allocation.detentionAcres) },
  'FM-2': { quantity: ({ geometry }) => geometry.ponds },
  'FM-3': { quantity: () => 1 },
  'FM-4': { quantity: () => 1 },
};

export function roundQuantity(value: number, unit: string): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  if (unit.toUpperCase() === 'AC') return Math.round(value * 100) / 100;
  return Math.round(value);
}
