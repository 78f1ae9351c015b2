import { useState } from 'react';
import { ChevronDown, ChevronRight } from 'lucide-react';
import type { EstimateCategory, LineItemPatch, Section } from '../types/estimate';
import { formatCurrency } from '../lib/format';
import NumberField from './NumberField';

interface EstimateSectionTableProps {
  section: Section;
  onEdit: (category: EstimateCategory, code: string, patch: LineItemPatch) => void;
}

export default function EstimateSectionTable({ section, onEdit }: EstimateSectionTableProps) {
  const [open, setOpen] = useState(true);

  return (
    <div className="bg-white rounded-xl border border-slate-200 overflow-hidden">
      <button
        onClick={() => setOpen((o) => !o)}
        className="w-full flex items-center justify-between px-4 py-3 bg-slate-50 hover:bg-slate-100 transition-colors"
      >
        <span className="flex items-center gap-2 text-sm font-semibold text-slate-700">
          {open ? <ChevronDown className="h-4 w-4" /> : <ChevronRight className="h-4 w-4" />}
          {section.category}
          <span className="text-xs font-normal text-slate-400">{section.items.length} items</span>
        </span>
        <span className="text-sm font-bold text-slate-800">{formatCurrency(section.subtotal, 2)}</span>
      </button>

      {open && (
        <table className="w-full text-sm">
          <thead>
            <tr className="text-xs text-slate-400 uppercase tracking-wide border-b border-slate-100">
              <th className="text-left px-4 py-2 font-medium">Item</th>
              <th className="text-left px-2 py-2 font-medium">Description</th>
              <th className="text-right px-2 py-2 font-medium">Qty</th>
              <th className="text-left px-2 py-2 font-medium">Unit</th>
              <th className="text-right px-2 py-2 font-medium">Unit Price</th>
              <th className="text-right px-4 py-2 font-medium">Total</th>
            </tr>
          </thead>
          <tbody>
            {section.items.map((item) => (
              <tr key={item.code} className="border-b border-slate-50 hover:bg-slate-50/60">
                <td className="px-4 py-1.5 font-mono text-xs text-slate-500">{item.code}</td>
                <td className="px-2 py-1.5 text-slate-700">{item.name}</td>
                <td className="px-2 py-1.5 text-right">
                  <NumberField
                    value={item.quantity}
                    aria-label={`${item.code} quantity`}
                    className="w-24 text-right"
                    onCommit={(quantity) => onEdit(section.category, item.code, { quantity })}
                  />
                </td>
                <td className="px-2 py-1.5 text-xs text-slate-500">{item.unit}</td>
                <td className="px-2 py-1.5 text-right">
                  <NumberField
                    value={item.unitPrice}
                    step={0.01}
                    aria-label={`${item.code} unit price`}
                    className="w-24 text-right"
                    onCommit={(unitPrice) => onEdit(section.category, item.code, { unitPrice })}
                  />
                </td>
                <td className="px-4 py-1.5 text-right font-medium text-slate-800">{formatCurrency(item.total, 2)}</td>
              </tr>
            ))}
            {section.items.length === 0 && (
              <tr>
                <td colSpan={6} className="px-4 py-3 text-center text-xs text-slate-400">
                  No items for the current site options
                </td>
              </tr>
            )}
          </tbody>
        </table>
      )}
    </div>
  );
}
