interface MetricCardProps {
  label: string;
  value: string;
  sub?: string;
  tone?: 'default' | 'positive' | 'negative';
}

const TONES = {
  default: 'text-slate-800',
  positive: 'text-emerald-700',
  negative: 'text-red-600',
};

export default function MetricCard({ label, value, sub, tone = 'default' }: MetricCardProps) {
  return (
    <div className="bg-white rounded-lg p-4 border border-slate-100 shadow-sm">
      <p className="text-xs font-medium text-slate-400 uppercase tracking-wide mb-1">{label}</p>
      <p className={`text-xl font-bold ${value === 'N/A' ? 'text-slate-400' : TONES[tone]}`}>{value}</p>
      {sub && <p className="text-xs text-slate-400 mt-1">{sub}</p>}
    </div>
  );
}
