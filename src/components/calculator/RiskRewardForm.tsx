'use client';

import type { FormEvent, ReactNode } from 'react';
import { Calculator, DollarSign, Loader2, Receipt, RotateCcw, TrendingUp } from 'lucide-react';
import GlossaryTerm from '@/components/GlossaryTerm';
import { RISK_REWARD_FIELDS, type RiskRewardFieldDefinition } from '@/lib/risk-reward-input';
import type { RiskRewardField } from '@/types';

interface RiskRewardFormProps {
  values: Record<RiskRewardField, string>;
  isCalculating: boolean;
  onChange: (field: RiskRewardField, value: string) => void;
  onSubmit: () => void;
  onReset: () => void;
}

const GROUPS: { key: RiskRewardFieldDefinition['group']; title: string; icon: ReactNode }[] = [
  { key: 'price', title: 'Price Parameters', icon: <DollarSign className="w-4 h-4 text-primary-400" /> },
  { key: 'position', title: 'Position Parameters', icon: <TrendingUp className="w-4 h-4 text-primary-400" /> },
  { key: 'cost', title: 'Cost Parameters', icon: <Receipt className="w-4 h-4 text-primary-400" /> },
];

// Field label → glossary entry
const GLOSSARY_TERMS: Partial<Record<RiskRewardField, string>> = {
  maxAgainstPrice: 'Stop-loss',
  tickSize: 'Tick size',
  tickValue: 'Tick value',
  numLots: 'Lot',
  rebatePerLot: 'Rebate',
};

function FieldInput({
  field,
  value,
  onChange,
}: {
  field: RiskRewardFieldDefinition;
  value: string;
  onChange: (value: string) => void;
}) {
  const term = GLOSSARY_TERMS[field.key];
  const id = `rr-${field.key}`;

  return (
    <div>
      <label htmlFor={id} className="text-xs text-muted-foreground block mb-1">
        {term ? <GlossaryTerm term={term}>{field.label}</GlossaryTerm> : field.label}
        {field.required && <span className="text-loss ml-0.5">*</span>}
      </label>
      {/* Text input: prices like 0.00001234 must round-trip exactly as typed */}
      <input
        id={id}
        type="text"
        inputMode="decimal"
        autoComplete="off"
        className="input-field w-full font-mono"
        title={field.help}
        placeholder={field.required ? '' : '0'}
        value={value}
        onChange={(e) => onChange(e.target.value)}
      />
      <p className="text-[11px] text-muted-foreground/70 mt-1">{field.help}</p>
    </div>
  );
}

export default function RiskRewardForm({ values, isCalculating, onChange, onSubmit, onReset }: RiskRewardFormProps) {
  const handleSubmit = (e: FormEvent<HTMLFormElement>) => {
    e.preventDefault();
    onSubmit();
  };

  const renderGroup = (group: (typeof GROUPS)[number]) => (
    <section key={group.key} className="space-y-3">
      <h2 className="text-sm font-semibold text-foreground flex items-center gap-2">
        {group.icon}
        {group.title}
      </h2>
      {RISK_REWARD_FIELDS.filter((f) => f.group === group.key).map((field) => (
        <FieldInput
          key={field.key}
          field={field}
          value={values[field.key]}
          onChange={(value) => onChange(field.key, value)}
        />
      ))}
    </section>
  );

  const [priceGroup, positionGroup, costGroup] = GROUPS;

  return (
    <form onSubmit={handleSubmit} className="card-surface p-5 space-y-5" noValidate>
      <div className="grid grid-cols-1 md:grid-cols-2 gap-6">
        <div>{renderGroup(priceGroup)}</div>
        <div className="space-y-6">
          {renderGroup(positionGroup)}
          {renderGroup(costGroup)}
        </div>
      </div>

      <div className="flex gap-3 border-t border-border pt-4">
        <button type="submit" className="btn-primary flex-1 flex items-center justify-center gap-2" disabled={isCalculating}>
          {isCalculating ? <Loader2 className="w-4 h-4 animate-spin" /> : <Calculator className="w-4 h-4" />}
          Calculate Risk-Reward
        </button>
        <button
          type="button"
          onClick={onReset}
          className="px-3 py-2 rounded-lg text-sm text-muted-foreground border border-border hover:text-foreground flex items-center gap-1.5"
        >
          <RotateCcw className="w-3.5 h-3.5" />
          Reset
        </button>
      </div>
    </form>
  );
}
