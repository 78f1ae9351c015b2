import { useMemo, type ReactNode } from 'react';
import { AlertTriangle, Download, RotateCcw } from 'lucide-react';
import type { EstimateCategory, ProjectInfo } from '../types/estimate';
import { ESTIMATE_CATEGORIES } from '../types/estimate';
import type { HardCosts, ProformaInputs, ProformaInputsPatch, ProformaResult, SoftCosts } from '../types/proforma';
import type { MirroredField } from '../types/session';
import { runProformaSensitivity } from '../lib/proforma';
import { buildProformaCsv, downloadCsv, proformaCsvFilename } from '../lib/export';
import { formatCurrency, formatNumber, formatPct } from '../lib/format';
import MetricCard from './MetricCard';
import NumberField from './NumberField';

interface ProformaPanelProps {
  inputs: ProformaInputs;
  result: ProformaResult;
  projectInfo: ProjectInfo;
  /** fields the next estimate sync will overwrite */
  pendingOverwrites: MirroredField[];
  onChange: (patch: ProformaInputsPatch) => void;
  onRestoreFromEstimate: () => void;
}

type ScalarField = Exclude<keyof ProformaInputs, 'hardCosts' | 'softCosts'>;

const ASSUMPTION_FIELDS: { field: ScalarField; label: string; step?: number }[] = [
  { field: 'lotSalePrice', label: 'Lot Sale Price ($)' },
  { field: 'landCostPerAcre', label: 'Land Cost / Acre ($)' },
  { field: 'salesCommissionPct', label: 'Sales Commission (%)', step: 0.1 },
  { field: 'loanRatePct', label: 'Loan Rate (%)', step: 0.1 },
  { field: 'devMonths', label: 'Development Months' },
  { field: 'salesMonths', label: 'Sales Months' },
  { field: 'lotsPerMonth', label: 'Lots / Month' },
];

const SOFT_COST_FIELDS: { field: keyof SoftCosts; label: string }[] = [
  { field: 'engineering', label: 'Engineering' },
  { field: 'permits', label: 'Permits' },
  { field: 'legal', label: 'Legal' },
  { field: 'marketing', label: 'Marketing' },
];

function scalarPatch(field: ScalarField, value: number): ProformaInputsPatch {
  const patch: ProformaInputsPatch = {};
  patch[field] = value;
  return patch;
}

function hardCostPatch(category: EstimateCategory, value: number): ProformaInputsPatch {
  const hardCosts: Partial<HardCosts> = {};
  hardCosts[category] = value;
  return { hardCosts };
}

function softCostPatch(field: keyof SoftCosts, value: number): ProformaInputsPatch {
  const softCosts: Partial<SoftCosts> = {};
  softCosts[field] = value;
  return { softCosts };
}

function Field({ label, children }: { label: string; children: ReactNode }) {
  return (
    <label className="text-xs text-slate-500 space-y-1 block">
      <span>{label}</span>
      {children}
    </label>
  );
}

export default function ProformaPanel({
  inputs,
  result,
  projectInfo,
  pendingOverwrites,
  onChange,
  onRestoreFromEstimate,
}: ProformaPanelProps) {
  const sensitivity = useMemo(() => runProformaSensitivity(inputs, result), [inputs, result]);
  const overridden = new Set(pendingOverwrites);
  const profitTone = result.grossProfit >= 0 ? 'positive' : 'negative';

  return (
    <div className="space-y-5">
      {pendingOverwrites.length > 0 && (
        <div className="flex items-start gap-2 bg-amber-50 border border-amber-200 rounded-lg p-3 text-xs text-amber-800">
          <AlertTriangle className="h-4 w-4 flex-shrink-0" />
          <p className="flex-1">
            {pendingOverwrites.length} field(s) differ from the estimate ({pendingOverwrites.join(', ')}). The next
            estimate recalculation will overwrite them.
          </p>
          <button
            type="button"
            onClick={onRestoreFromEstimate}
            className="inline-flex items-center gap-1 px-2 py-1 font-medium text-amber-900 bg-amber-100 hover:bg-amber-200 rounded-md transition-colors"
          >
            <RotateCcw className="h-3.5 w-3.5" />
            Recalculate now
          </button>
        </div>
      )}

      <div className="bg-white rounded-xl border border-slate-200 p-5 space-y-4">
        <h2 className="text-sm font-semibold text-slate-700">From Estimate</h2>
        <div className="grid grid-cols-2 md:grid-cols-5 gap-3">
          <Field label="Acres">
            <NumberField
              value={inputs.acres}
              highlight={overridden.has('acres')}
              className="w-full"
              onCommit={(acres) => onChange({ acres })}
            />
          </Field>
          <Field label="Lots">
            <NumberField
              value={inputs.lotCount}
              highlight={overridden.has('lotCount')}
              className="w-full"
              onCommit={(lotCount) => onChange({ lotCount })}
            />
          </Field>
          {ESTIMATE_CATEGORIES.map((c) => (
            <Field key={c} label={c}>
              <NumberField
                value={inputs.hardCosts[c]}
                step={0.01}
                highlight={overridden.has(`hardCosts.${c}`)}
                className="w-full"
                onCommit={(v) => onChange(hardCostPatch(c, v))}
              />
            </Field>
          ))}
        </div>

        <h2 className="text-sm font-semibold text-slate-700 pt-2">Assumptions</h2>
        <div className="grid grid-cols-2 md:grid-cols-4 gap-3">
          {ASSUMPTION_FIELDS.map(({ field, label, step }) => (
            <Field key={field} label={label}>
              <NumberField
                value={inputs[field]}
                step={step}
                className="w-full"
                onCommit={(v) => onChange(scalarPatch(field, v))}
              />
            </Field>
          ))}
          {SOFT_COST_FIELDS.map(({ field, label }) => (
            <Field key={field} label={`${label} ($)`}>
              <NumberField
                value={inputs.softCosts[field]}
                className="w-full"
                onCommit={(v) => onChange(softCostPatch(field, v))}
              />
            </Field>
          ))}
        </div>
      </div>

      <div className="grid grid-cols-2 md:grid-cols-4 gap-3">
        <MetricCard label="Land Acquisition" value={formatCurrency(result.landAcquisition)} />
        <MetricCard label="Hard Costs" value={formatCurrency(result.hardCostTotal)} />
        <MetricCard label="Soft Costs" value={formatCurrency(result.softCostTotal)} />
        <MetricCard label="Construction Interest" value={formatCurrency(result.constructionInterest)} />
        <MetricCard label="Total Dev Cost" value={formatCurrency(result.totalDevCost)} />
        <MetricCard label="Gross Revenue" value={formatCurrency(result.grossRevenue)} />
        <MetricCard label="Net Revenue" value={formatCurrency(result.netRevenue)} sub={`Commission ${formatCurrency(result.salesCommission)}`} />
        <MetricCard label="Gross Profit" value={formatCurrency(result.grossProfit)} tone={profitTone} />
        <MetricCard label="Profit Margin" value={formatPct(result.profitMarginPct)} tone={profitTone} />
        <MetricCard label="ROI" value={formatPct(result.roiPct)} tone={profitTone} />
        <MetricCard label="Cost / Lot" value={formatCurrency(result.costPerLot)} sub={`Hard ${formatCurrency(result.hardCostPerLot)}`} />
        <MetricCard
          label="Timeline"
          value={`${result.totalDurationMonths} mo`}
          sub={`Absorption ${formatNumber(result.absorptionMonths, 0)} mo`}
        />
      </div>

      <div className="bg-white rounded-xl border border-slate-200 overflow-hidden">
        <div className="flex items-center justify-between px-4 py-3 bg-slate-50">
          <h3 className="text-sm font-semibold text-slate-700">Sensitivity</h3>
          <button
            onClick={() => downloadCsv(buildProformaCsv(inputs, result, projectInfo), proformaCsvFilename(projectInfo))}
            className="inline-flex items-center gap-1.5 px-3 py-1.5 text-xs font-medium text-teal-700 bg-teal-50 hover:bg-teal-100 rounded-md transition-colors"
          >
            <Download className="h-3.5 w-3.5" />
            CSV
          </button>
        </div>
        <table className="w-full text-sm">
          <thead>
            <tr className="text-xs text-slate-400 uppercase tracking-wide border-b border-slate-100">
              <th className="text-left px-4 py-2 font-medium">Change</th>
              <th className="text-right px-2 py-2 font-medium">New ROI</th>
              <th className="text-right px-2 py-2 font-medium">ROI Delta</th>
              <th className="text-right px-4 py-2 font-medium">Profit Delta</th>
            </tr>
          </thead>
          <tbody>
            {sensitivity.map((row) => (
              <tr key={row.change} className="border-b border-slate-50">
                <td className="px-4 py-1.5 text-slate-700">{row.change}</td>
                <td className="px-2 py-1.5 text-right">{formatPct(row.newROI)}</td>
                <td className="px-2 py-1.5 text-right">{formatPct(row.roiDelta)}</td>
                <td className="px-4 py-1.5 text-right">{formatCurrency(row.profitDelta)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </div>
  );
}
