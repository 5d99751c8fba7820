import { describe, it, expect } from 'vitest';
import { generateId, generateRunId } from './ids.js';

describe('ids', () => {
  it('prefixes run IDs', () => {
    expect(generateRunId()).toMatch(/^run-[0-9a-z]+-[0-9a-f]{8}$/);
  });

  it('omits an empty prefix', () => {
    expect(generateId()).toMatch(/^[0-9a-z]+-[0-9a-f]{8}$/);
  });

  it('uses an injected generator', () => {
    const idGenerator = { generate: (prefix?: string) => `${prefix ?? 'none'}-1` };

    expect(generateRunId({ idGenerator })).toBe('run-1');
  });
});
