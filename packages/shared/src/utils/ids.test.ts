import { describe, it, expect } from 'vitest';
import { defaultIdGenerator, generateCorrelationId, generateRunId, type IdGenerator } from './ids.js';

describe('ids', () => {
  it('should prefix run and correlation ids', () => {
    expect(generateRunId()).toMatch(/^run-[0-9a-z]+-[0-9a-f]{8}$/);
    expect(generateCorrelationId()).toMatch(/^cor-[0-9a-z]+-[0-9a-f]{8}$/);
  });

  it('should not repeat', () => {
    expect(defaultIdGenerator.generate('run')).not.toBe(defaultIdGenerator.generate('run'));
  });

  it('should use an injected generator', () => {
    let next = 0;
    const counter: IdGenerator = { generate: (prefix) => `${prefix}-${++next}` };

    expect(generateRunId(counter)).toBe('run-1');
    expect(generateCorrelationId(counter)).toBe('cor-2');
  });
});
