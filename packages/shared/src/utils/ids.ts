/**
 * Run and correlation ids.
 *
 * Ids have the form `<prefix>-<base36 time>-<8 hex chars>`. The pipeline
 * takes an {@link IdGenerator} so tests can pin them.
 */

export interface IdGenerator {
  generate(prefix: string): string;
}

export const defaultIdGenerator: IdGenerator = {
  generate: (prefix) => `${prefix}-${Date.now().toString(36)}-${globalThis.crypto.randomUUID().slice(0, 8)}`,
};

/** Id of one validation request, echoed as `X-Run-Id` */
export function generateRunId(generator: IdGenerator = defaultIdGenerator): string {
  return generator.generate('run');
}

/** Used when the caller sends no correlation id */
export function generateCorrelationId(generator: IdGenerator = defaultIdGenerator): string {
  return generator.generate('cor');
}
