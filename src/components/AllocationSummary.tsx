import type { AllocationResult } from '../types/estimate';
import { formatNumber } from '../lib/format';
import MetricCard from './MetricCard';

export default function AllocationSummary({ allocation }: { allocation: AllocationResult }) {
  const rows = [
    { label: 'Roads', pct: allocation.roadsPct, acres: allocation.roadsAcres },
    { label: 'Open Space', pct: allocation.openSpacePct, acres: allocation.openSpaceAcres },
    { label: 'Detention', pct: allocation.detentionPct, acres: allocation.detentionAcres },
    { label: 'Buffers', pct: allocation.buffersPct, acres: allocation.buffersAcres },
    { label: 'Net Developable', pct: allocation.netDevelopablePct, acres: allocation.netDevelopableAcres },
  ];

  return (
    <div className="grid grid-cols-2 md:grid-cols-6 gap-3">
      {rows.map((r) => (
        <MetricCard key={r.label} label={r.label} value={`${formatNumber(r.acres)} ac`} sub={`${r.pct}%`} />
      ))}
      <MetricCard label="Lots" value={formatNumber(allocation.lotCount, 0)} sub="Buildable" />
    </div>
  );
}
