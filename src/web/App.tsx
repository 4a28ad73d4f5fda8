import { useState, useCallback } from 'react';
import { formatListing, listingFileName, listingText, translate, type TranslationResult } from '../translator/index.js';

const DEFAULT_EXPRESSION = 'x = 6 + 9';

export function App() {
  const [expression, setExpression] = useState(DEFAULT_EXPRESSION);
  const [result, setResult] = useState<TranslationResult | null>(null);

  const handleConvert = useCallback(() => {
    setResult(translate(expression));
  }, [expression]);

  const handleDownload = useCallback(() => {
    if (!result || !result.ok) return;
    const blob = new Blob([listingText(result.instructions)], { type: 'text/plain' });
    const url = URL.createObjectURL(blob);
    const a = document.createElement('a');
    a.href = url;
    a.download = listingFileName(result.variable);
    a.click();
    URL.revokeObjectURL(url);
  }, [result]);

  return (
    <div style={{ fontFamily: 'sans-serif', maxWidth: 960, margin: '0 auto', padding: 16 }}>
      <h1>Register Transfer Level (RTL) Translator</h1>
      <p>
        Translates a simple assignment into register transfer operations. Supported
        operators are <code>+</code>, <code>-</code>, <code>*</code> and <code>/</code>,
        evaluated strictly left to right.
      </p>

      <div style={{ display: 'flex', gap: 32 }}>
        <section style={{ flex: 1 }}>
          <h2>Input</h2>
          <label>
            Arithmetic expression:
            <input
              type="text"
              value={expression}
              placeholder="result = a + b - 3"
              onChange={(e) => setExpression(e.target.value)}
              onKeyDown={(e) => {
                if (e.key === 'Enter') handleConvert();
              }}
              style={{ display: 'block', width: '100%', fontFamily: 'monospace', marginTop: 4 }}
            />
          </label>
          <button onClick={handleConvert} style={{ marginTop: 8 }}>
            Convert to RTL
          </button>
        </section>

        <section style={{ flex: 1 }}>
          <h2>RTL Output</h2>
          {result && !result.ok && (
            <div role="alert" style={{ color: '#b00020' }}>
              Error: {result.error.message}
            </div>
          )}
          {result && result.ok && (
            <>
              <ol style={{ listStyle: 'none', padding: 0, fontFamily: 'monospace' }}>
                {formatListing(result.instructions).map((line) => (
                  <li key={line}>{line}</li>
                ))}
              </ol>
              <button onClick={handleDownload}>Download RTL Instructions</button>
            </>
          )}
        </section>
      </div>

      <hr />
      <h3>How it works</h3>
      <ol>
        <li>The right-hand side is split into numbers, variables and operators.</li>
        <li>Each operand is loaded into a new register (R1, R2, R3, ...).</li>
        <li>Each operation combines the running result with the next register.</li>
        <li>The final register is stored in the target variable.</li>
      </ol>
      <p>
        There is no operator precedence: <code>3 + 2 * 4</code> is evaluated
        as <code>(3 + 2) * 4</code>.
      </p>
    </div>
  );
}
