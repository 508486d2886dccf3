import { useEffect, useState } from 'react';
import type { ParameterDefinition } from '../lib/types';
import { commitNumberDraft, parseNumberDraft } from '../lib/numberDraft';

interface NumberFieldProps {
  definition: ParameterDefinition;
  value: number;
  onChange: (value: number) => void;
}

// Keeps the typed text as a draft; only in-range numbers reach onChange
function NumberField({ definition, value, onChange }: NumberFieldProps) {
  const [draft, setDraft] = useState(String(value));
  const parsed = parseNumberDraft(draft, definition);

  useEffect(() => {
    setDraft((current) => (Number(current) === value && current.trim() !== '' ? current : String(value)));
  }, [value]);

  const commit = () => {
    const next = commitNumberDraft(draft, definition, value);
    setDraft(String(next));
    if (next !== value) onChange(next);
  };

  return (
    <div className="field">
      <label className="field-label" htmlFor={definition.key}>
        {definition.label}
      </label>
      <input
        id={definition.key}
        type="number"
        min={definition.min}
        max={definition.max}
        step={definition.step}
        value={draft}
        onChange={(e) => {
          setDraft(e.target.value);
          const result = parseNumberDraft(e.target.value, definition);
          if (result.ok) onChange(result.value);
        }}
        onBlur={commit}
        onKeyDown={(e) => {
          if (e.key === 'Enter') commit();
        }}
        aria-invalid={!parsed.ok}
        className="input"
      />
      {!parsed.ok && <div className="metric-note field-hint">{parsed.message}</div>}
    </div>
  );
}

export default NumberField;
