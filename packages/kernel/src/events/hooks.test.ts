import { describe, it, expect, vi } from 'vitest';
import type { Logger } from '@efaktur/shared';
import { CompositeEventHooks, LoggingEventHooks, type StepCompleteEvent } from './hooks.js';

const STEP_EVENT: StepCompleteEvent = {
  runId: 'run-1',
  correlationId: 'cor-1',
  timestamp: '2024-01-01T00:00:00.000Z',
  stage: 'fetch',
  durationMs: 12,
};

describe('CompositeEventHooks', () => {
  it('should dispatch to every listener that implements the event', async () => {
    const first = vi.fn();
    const second = vi.fn(() => Promise.resolve());
    const hooks = new CompositeEventHooks([{ onStepComplete: first }, {}, { onStepComplete: second }]);

    await hooks.onStepComplete(STEP_EVENT);

    expect(first).toHaveBeenCalledWith(STEP_EVENT);
    expect(second).toHaveBeenCalledWith(STEP_EVENT);
  });
});

describe('LoggingEventHooks', () => {
  it('should log stage timings at debug level', () => {
    const debug = vi.fn();
    const logger: Logger = { debug, info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: () => logger };

    new LoggingEventHooks(logger).onStepComplete(STEP_EVENT);

    expect(debug).toHaveBeenCalledWith('Stage completed', { runId: 'run-1', stage: 'fetch', durationMs: 12 });
  });

  it('should log stopped runs as warnings', () => {
    const warn = vi.fn();
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn(), child: () => logger };

    new LoggingEventHooks(logger).onError({
      runId: 'run-1',
      correlationId: 'cor-1',
      timestamp: '2024-01-01T00:00:00.000Z',
      stage: 'qr',
      code: 'QR_NOT_FOUND',
      message: 'No valid QR code found in the document',
    });

    expect(warn).toHaveBeenCalledWith('Validation stopped', {
      runId: 'run-1',
      stage: 'qr',
      code: 'QR_NOT_FOUND',
      message: 'No valid QR code found in the document',
    });
  });
});
