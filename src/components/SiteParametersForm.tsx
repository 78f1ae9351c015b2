import { useEffect, useState, type FormEvent } from 'react';
import { Calculator, FolderOpen } from 'lucide-react';
import type { CurbType, PricePolicy, SewerType, SiteParameters } from '../types/estimate';
import { CURB_TYPES, SEWER_TYPES } from '../types/estimate';

interface SiteParametersFormProps {
  site: SiteParameters;
  pricePolicy: PricePolicy;
  onSubmit: (site: SiteParameters) => void;
  onPricePolicyChange: (policy: PricePolicy) => void;
  onLoadExample: () => void;
}

const PRICE_POLICIES: { value: PricePolicy; label: string }[] = [
  { value: 'preserve', label: 'Keep edited prices' },
  { value: 'reset', label: 'Reset to default prices' },
];

const SEWER_LABELS: Record<SewerType, string> = {
  public: 'Public sewer',
  septic: 'Septic',
};

const CURB_LABELS: Record<CurbType, string> = {
  standard: 'Standard curb & gutter',
  rolled: 'Roll curb',
  none: 'No curb',
};

export default function SiteParametersForm({
  site,
  pricePolicy,
  onSubmit,
  onPricePolicyChange,
  onLoadExample,
}: SiteParametersFormProps) {
  const [acres, setAcres] = useState(String(site.grossAcres));
  const [lotSize, setLotSize] = useState(String(site.targetLotSizeSqFt));
  const [sewerType, setSewerType] = useState<SewerType>(site.sewerType);
  const [curbType, setCurbType] = useState<CurbType>(site.curbType);
  const [hasSidewalk, setHasSidewalk] = useState(site.hasSidewalk);

  useEffect(() => {
    setAcres(String(site.grossAcres));
    setLotSize(String(site.targetLotSizeSqFt));
    setSewerType(site.sewerType);
    setCurbType(site.curbType);
    setHasSidewalk(site.hasSidewalk);
  }, [site]);

  const handleSubmit = (e: FormEvent) => {
    e.preventDefault();
    onSubmit({
      grossAcres: Number(acres),
      targetLotSizeSqFt: Number(lotSize),
      sewerType,
      curbType,
      hasSidewalk,
    });
  };

  return (
    <form onSubmit={handleSubmit} className="bg-white rounded-xl border border-slate-200 p-5 space-y-4">
      <div className="flex items-center justify-between">
        <h2 className="text-sm font-semibold text-slate-700">Site Parameters</h2>
        <button
          type="button"
          onClick={onLoadExample}
          className="inline-flex items-center gap-1.5 px-3 py-1.5 text-xs font-medium text-slate-600 bg-slate-100 hover:bg-slate-200 rounded-md transition-colors"
        >
          <FolderOpen className="h-3.5 w-3.5" />
          Load Example
        </button>
      </div>

      <div className="grid grid-cols-2 md:grid-cols-5 gap-3">
        <label className="text-xs text-slate-500 space-y-1">
          <span>Gross Acres</span>
          <input
            type="number"
            step="0.1"
            value={acres}
            onChange={(e) => setAcres(e.target.value)}
            className="w-full px-2 py-1.5 text-sm border border-slate-200 rounded-md"
          />
        </label>
        <label className="text-xs text-slate-500 space-y-1">
          <span>Target Lot Size (SF)</span>
          <input
            type="number"
            step="100"
            value={lotSize}
            onChange={(e) => setLotSize(e.target.value)}
            className="w-full px-2 py-1.5 text-sm border border-slate-200 rounded-md"
          />
        </label>
        <label className="text-xs text-slate-500 space-y-1">
          <span>Sewer</span>
          <select
            value={sewerType}
            onChange={(e) => setSewerType(SEWER_TYPES.find((s) => s === e.target.value) ?? 'public')}
            className="w-full px-2 py-1.5 text-sm border border-slate-200 rounded-md bg-white"
          >
            {SEWER_TYPES.map((s) => (
              <option key={s} value={s}>{SEWER_LABELS[s]}</option>
            ))}
          </select>
        </label>
        <label className="text-xs text-slate-500 space-y-1">
          <span>Curb</span>
          <select
            value={curbType}
            onChange={(e) => setCurbType(CURB_TYPES.find((c) => c === e.target.value) ?? 'standard')}
            className="w-full px-2 py-1.5 text-sm border border-slate-200 rounded-md bg-white"
          >
            {CURB_TYPES.map((c) => (
              <option key={c} value={c}>{CURB_LABELS[c]}</option>
            ))}
          </select>
        </label>
        <label className="flex items-center gap-2 text-xs text-slate-600 mt-5">
          <input type="checkbox" checked={hasSidewalk} onChange={(e) => setHasSidewalk(e.target.checked)} />
          Sidewalks
        </label>
      </div>

      <div className="flex flex-wrap items-center gap-3">
        <button
          type="submit"
          className="inline-flex items-center gap-1.5 px-4 py-2 text-sm font-medium text-white bg-teal-700 hover:bg-teal-800 rounded-lg transition-colors"
        >
          <Calculator className="h-4 w-4" />
          Calculate Full Estimate
        </button>
        <label className="flex items-center gap-2 text-xs text-slate-500">
          <span>On recalculation</span>
          <select
            value={pricePolicy}
            onChange={(e) => {
              const next = PRICE_POLICIES.find((p) => p.value === e.target.value);
              if (next) onPricePolicyChange(next.value);
            }}
            className="px-2 py-1.5 text-sm border border-slate-200 rounded-md bg-white"
          >
            {PRICE_POLICIES.map((p) => (
              <option key={p.value} value={p.value}>{p.label}</option>
            ))}
          </select>
        </label>
      </div>
    </form>
  );
}
