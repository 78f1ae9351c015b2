import { describe, it, expect } from 'vitest';
import { buildProformaCsv, proformaCsvFilename } from '../proformaCsv';
import { computeProforma } from '../../proforma';
import type { ProformaInputs } from '../../../types/proforma';
import type { ProjectInfo } from '../../../types/estimate';

function makeInput(overrides: Partial<ProformaInputs> = {}): ProformaInputs {
  return {
    acres: 10,
    lotCount: 0,
    lotSalePrice: 50_000,
    landCostPerAcre: 10_000,
    hardCosts: {
      Earthwork: 0,
      'Erosion Control': 0,
      'Storm Drainage': 0,
      'Sanitary Sewer': 0,
      Water: 500_000,
      'Paving & Concrete': 0,
      'Striping & Signage': 0,
      'Fencing & Misc': 0,
    },
    softCosts: { engineering: 0, permits: 0, legal: 0, marketing: 0 },
    salesCommissionPct: 6,
    loanRatePct: 12,
    devMonths: 10,
    salesMonths: 12,
    lotsPerMonth: 4,
    ...overrides,
  };
}

const PROJECT: ProjectInfo = { name: 'Oak Ridge, Phase "2"', location: 'Test County', preparedBy: 'QA', date: '2026-03-01' };

function csvLines(inputs: ProformaInputs = makeInput()): string[] {
  return buildProformaCsv(inputs, computeProforma(inputs), PROJECT).split('\n');
}

describe('buildProformaCsv', () => {
  it('starts with the header row', () => {
    expect(csvLines()[0]).toBe('Section,Metric,Value');
  });

  it('quotes cells with commas and quotes', () => {
    expect(csvLines()[1]).toBe('Project,Name,"Oak Ridge, Phase ""2"""');
  });

  it('prefixes text that a spreadsheet would read as a formula', () => {
    const project = { ...PROJECT, name: '=HYPERLINK("x")', location: '@home', preparedBy: '-QA' };
    const inputs = makeInput();
    const lines = buildProformaCsv(inputs, computeProforma(inputs), project).split('\n');
    expect(lines[1]).toBe('Project,Name,"\'=HYPERLINK(""x"")"');
    expect(lines[2]).toBe("Project,Location,'@home");
    expect(lines[3]).toBe("Project,Prepared By,'-QA");
  });

  it('leaves negative numbers alone', () => {
    expect(csvLines()).toContain('Returns,ROI %,-100');
  });

  it('writes numbers rounded to cents', () => {
    const lines = csvLines();
    expect(lines).toContain('Hard Costs,Water,500000');
    expect(lines).toContain('Development Cost,Construction Interest,30000');
    expect(lines).toContain('Development Cost,Total Development Cost,630000');
    expect(lines).toContain('Returns,ROI %,-100');
  });

  it('writes N/A for guarded metrics', () => {
    const lines = csvLines();
    expect(lines).toContain('Returns,Profit Margin %,N/A');
    expect(lines).toContain('Returns,Cost per Lot,N/A');
    expect(lines).toContain('Timeline,Absorption Months,N/A');
  });

  it('has one row per metric', () => {
    // header + 4 project + 9 inputs + 8 hard + 4 soft + 6 cost + 3 revenue + 6 returns + 2 timeline
    expect(csvLines()).toHaveLength(43);
  });
});

describe('proformaCsvFilename', () => {
  it('slugs the project name', () => {
    expect(proformaCsvFilename(PROJECT)).toBe('Oak_Ridge_Phase_2_proforma.csv');
  });

  it('falls back when the name is blank', () => {
    expect(proformaCsvFilename({ ...PROJECT, name: '  ' })).toBe('project_proforma.csv');
  });
});
