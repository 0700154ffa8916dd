'use client';

import { useState } from 'react';
import { ChevronDown, HelpCircle } from 'lucide-react';
import { cn } from '@/lib/utils';

const STEPS: { title: string; items: string[] }[] = [
  {
    title: 'Enter your position details (all values in USD)',
    items: [
      'Average Price: your entry price',
      'Max Against Price: your stop-loss level',
      'Target Price: your profit target',
      'Tick Size: minimum price movement (e.g., 0.05 for some futures)',
    ],
  },
  {
    title: 'Configure position parameters',
    items: [
      'Number of Lots: your position size',
      'Tick Value: dollar value per tick (e.g., $25 for some contracts)',
      'Total Lots for Entry/Exit: usually the same as number of lots',
    ],
  },
  {
    title: 'Add cost parameters (optional)',
    items: [
      'Transaction Cost per Lot: brokerage and charges per lot',
      'Rebate per Lot: any rebates you receive per lot',
    ],
  },
];

const INTERPRETATION = [
  { range: '1:3 or higher', label: 'Excellent setup', className: 'text-emerald-400' },
  { range: '1:2 to 1:3', label: 'Good setup', className: 'text-profit' },
  { range: '1:1 to 1:2', label: 'Moderate setup', className: 'text-warning' },
  { range: 'Below 1:1', label: 'Poor setup', className: 'text-loss' },
];

const EXAMPLES = [
  { market: 'Crypto', values: 'Price $0.008, Tick Size $0.001, Tick Value $1' },
  { market: 'Stocks', values: 'Price $150.50, Tick Size $0.01, Tick Value $1' },
  { market: 'Futures', values: 'Price $4200, Tick Size $0.25, Tick Value $12.50' },
];

export default function HowToUsePanel() {
  const [open, setOpen] = useState(false);

  return (
    <div className="card-surface">
      <button
        type="button"
        onClick={() => setOpen((v) => !v)}
        className="w-full flex items-center justify-between p-4 text-sm font-semibold text-foreground"
        aria-expanded={open}
      >
        <span className="flex items-center gap-2">
          <HelpCircle className="w-4 h-4 text-primary-400" />
          How to Use This Tool
        </span>
        <ChevronDown className={cn('w-4 h-4 transition-transform', open && 'rotate-180')} />
      </button>

      {open && (
        <div className="px-4 pb-4 space-y-4 text-sm text-muted-foreground animate-fade-in">
          <ol className="space-y-3">
            {STEPS.map((step, i) => (
              <li key={step.title}>
                <span className="text-foreground font-medium">Step {i + 1}:</span> {step.title}
                <ul className="list-disc ml-5 mt-1 space-y-0.5">
                  {step.items.map((item) => (
                    <li key={item}>{item}</li>
                  ))}
                </ul>
              </li>
            ))}
            <li>
              <span className="text-foreground font-medium">Step {STEPS.length + 1}:</span> Click Calculate to get
              your Risk-Reward analysis.
            </li>
          </ol>

          <div>
            <h4 className="text-foreground font-medium mb-1">Risk-Reward Interpretation</h4>
            <ul className="space-y-0.5">
              {INTERPRETATION.map((row) => (
                <li key={row.range}>
                  <span className="font-mono">{row.range}</span>: <span className={row.className}>{row.label}</span>
                </li>
              ))}
            </ul>
          </div>

          <div>
            <h4 className="text-foreground font-medium mb-1">Example Values</h4>
            <ul className="space-y-0.5">
              {EXAMPLES.map((ex) => (
                <li key={ex.market}>
                  <span className="text-foreground">{ex.market}:</span> {ex.values}
                </li>
              ))}
            </ul>
          </div>
        </div>
      )}
    </div>
  );
}
