/**
 * Run identifiers. Generation is injectable so tests can pin the values.
 */

export interface IdGenerator {
  generate(prefix?: string): string;
}

/**
 * `<prefix>-<base36 time>-<8 random hex>`
 */
export const defaultIdGenerator: IdGenerator = {
  generate: (prefix?: string) => {
    const stamp = `${Date.now().toString(36)}-${globalThis.crypto.randomUUID().slice(0, 8)}`;
    return prefix ? `${prefix}-${stamp}` : stamp;
  },
};

export interface GenerateIdOptions {
  /** Replaces {@link defaultIdGenerator} */
  idGenerator?: IdGenerator;
}

export function generateId(prefix = '', options?: GenerateIdOptions): string {
  return (options?.idGenerator ?? defaultIdGenerator).generate(prefix || undefined);
}

/**
 * ID of one workflow run, e.g. `run-lq2x4y-a1b2c3d4`
 */
export function generateRunId(options?: GenerateIdOptions): string {
  return generateId('run', options);
}
