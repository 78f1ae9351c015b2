import type { ProjectInfo } from '../../types/estimate';
import { ESTIMATE_CATEGORIES } from '../../types/estimate';
import type { ProformaInputs, ProformaResult } from '../../types/proforma';

type Cell = string | number | null;

function csvCell(value: Cell): string {
  if (value === null || (typeof value === 'number' && !Number.isFinite(value))) return 'N/A';
  // user text starting with a formula character is prefixed so spreadsheets show it as text
  const text =
    typeof value === 'number' ? String(Math.round(value * 100) / 100) : value.replace(/^[=+\-@\t\r]/, "'$&");
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function buildProformaRows(
  inputs: ProformaInputs,
  result: ProformaResult,
  projectInfo: ProjectInfo,
): [string, string, Cell][] {
  return [
    ['Project', 'Name', projectInfo.name],
    ['Project', 'Location', projectInfo.location],
    ['Project', 'Prepared By', projectInfo.preparedBy],
    ['Project', 'Date', projectInfo.date],

    ['Inputs', 'Acres', inputs.acres],
    ['Inputs', 'Lot Count', inputs.lotCount],
    ['Inputs', 'Lot Sale Price', inputs.lotSalePrice],
    ['Inputs', 'Land Cost per Acre', inputs.landCostPerAcre],
    ['Inputs', 'Sales Commission %', inputs.salesCommissionPct],
    ['Inputs', 'Loan Rate %', inputs.loanRatePct],
    ['Inputs', 'Development Months', inputs.devMonths],
    ['Inputs', 'Sales Months', inputs.salesMonths],
    ['Inputs', 'Lots per Month', inputs.lotsPerMonth],

    ...ESTIMATE_CATEGORIES.map((c): [string, string, Cell] => ['Hard Costs', c, inputs.hardCosts[c]]),
    ['Soft Costs', 'Engineering', inputs.softCosts.engineering],
    ['Soft Costs', 'Permits', inputs.softCosts.permits],
    ['Soft Costs', 'Legal', inputs.softCosts.legal],
    ['Soft Costs', 'Marketing', inputs.softCosts.marketing],

    ['Development Cost', 'Land Acquisition', result.landAcquisition],
    ['Development Cost', 'Hard Cost Total', result.hardCostTotal],
    ['Development Cost', 'Soft Cost Total', result.softCostTotal],
    ['Development Cost', 'Total Before Interest', result.totalDevCostPreInterest],
    ['Development Cost', 'Construction Interest', result.constructionInterest],
    ['Development Cost', 'Total Development Cost', result.totalDevCost],

    ['Revenue', 'Gross Revenue', result.grossRevenue],
    ['Revenue', 'Sales Commission', result.salesCommission],
    ['Revenue', 'Net Revenue', result.netRevenue],

    ['Returns', 'Gross Profit', result.grossProfit],
    ['Returns', 'Profit Margin %', result.profitMarginPct],
    ['Returns', 'ROI %', result.roiPct],
    ['Returns', 'Cost per Lot', result.costPerLot],
    ['Returns', 'Profit per Lot', result.profitPerLot],
    ['Returns', 'Hard Cost per Lot', result.hardCostPerLot],
    ['Returns', 'Land Cost per Lot', result.landCostPerLot],

    ['Timeline', 'Absorption Months', result.absorptionMonths],
    ['Timeline', 'Total Duration Months', result.totalDurationMonths],
  ];
}

export function buildProformaCsv(inputs: ProformaInputs, result: ProformaResult, projectInfo: ProjectInfo): string {
  const rows = buildProformaRows(inputs, result, projectInfo);
  return [['Section', 'Metric', 'Value'].join(','), ...rows.map((r) => r.map(csvCell).join(','))].join('\n');
}

export function proformaCsvFilename(projectInfo: ProjectInfo): string {
  const base = projectInfo.name.trim().replace(/[^A-Za-z0-9]+/g, '_').replace(/^_+|_+$/g, '') || 'project';
  return `${base}_proforma.csv`;
}
