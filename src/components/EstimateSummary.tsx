import { useState } from 'react';
import { FileSpreadsheet, Loader2 } from 'lucide-react';
import type { Estimate } from '../types/estimate';
import { formatCurrency } from '../lib/format';
import { downloadBlob, requestEstimateWorkbook } from '../lib/export';
import MetricCard from './MetricCard';

export default function EstimateSummary({ estimate }: { estimate: Estimate }) {
  const [exporting, setExporting] = useState(false);
  const [notice, setNotice] = useState<string | null>(null);

  const handleExport = async () => {
    setExporting(true);
    setNotice(null);
    const result = await requestEstimateWorkbook(estimate);
    setExporting(false);
    if (result.ok) {
      downloadBlob(result.blob, result.filename);
    } else {
      setNotice(result.reason);
    }
  };

  return (
    <div className="space-y-3">
      <div className="grid grid-cols-1 md:grid-cols-3 gap-3">
        <MetricCard label="Grand Total" value={formatCurrency(estimate.grandTotal, 2)} sub="Hard costs, 8 categories" />
        <MetricCard label="Cost per Lot" value={formatCurrency(estimate.costPerLot)} sub={`${estimate.allocation.lotCount} lots`} />
        <MetricCard label="Cost per Acre" value={formatCurrency(estimate.costPerAcre)} sub={`${estimate.site.grossAcres} gross acres`} />
      </div>
      <div className="flex items-center gap-3">
        <button
          onClick={() => {
            void handleExport();
          }}
          disabled={exporting}
          className="inline-flex items-center gap-1.5 px-3 py-1.5 text-xs font-medium text-teal-700 bg-teal-50 hover:bg-teal-100 rounded-md transition-colors disabled:opacity-50"
        >
          {exporting ? <Loader2 className="h-3.5 w-3.5 animate-spin" /> : <FileSpreadsheet className="h-3.5 w-3.5" />}
          Export Workbook
        </button>
        {notice && <p className="text-xs text-amber-700">{notice}</p>}
      </div>
    </div>
  );
}
