import type { BreakdownRow } from '@/types';

export default function BreakdownTable({ rows }: { rows: BreakdownRow[] }) {
  return (
    <div className="card-surface p-4 overflow-x-auto">
      <h3 className="text-sm font-semibold text-foreground mb-3">Detailed Breakdown</h3>
      <table className="w-full text-sm">
        <thead>
          <tr className="text-xs text-muted-foreground border-b border-border">
            <th className="text-left font-medium py-2">Component</th>
            <th className="text-right font-medium py-2">Risk Calculation</th>
            <th className="text-right font-medium py-2">Reward Calculation</th>
          </tr>
        </thead>
        <tbody>
          {rows.map((row) => (
            <tr key={row.component} className="border-b border-border/40 last:border-0">
              <td className="py-2 text-foreground">{row.component}</td>
              <td className="py-2 text-right font-mono">{row.risk}</td>
              <td className="py-2 text-right font-mono">{row.reward}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
