import { describe, it, expect, vi } from 'vitest';
import type { ExtractionResult } from '@nfe-ledger/contracts';
import { createLogger, type LogEntry } from '@nfe-ledger/shared';
import { CompositeEventHooks, LoggingEventHooks, createStepCompleteEvent, type RunCompleteEvent } from './hooks.js';

const completeEvent: RunCompleteEvent = {
  runId: 'run-1',
  timestamp: '2024-01-15T10:00:00.000Z',
  durationMs: 12,
  route: 'done',
  ok: true,
};

describe('CompositeEventHooks', () => {
  it('dispatches to every hook that implements the event', async () => {
    const first = { onRunComplete: vi.fn() };
    const second = { onRunStart: vi.fn(), flush: vi.fn(() => Promise.resolve()) };
    const hooks = new CompositeEventHooks([first, second]);

    await hooks.onRunComplete(completeEvent);
    await hooks.flush();

    expect(first.onRunComplete).toHaveBeenCalledWith(completeEvent);
    expect(second.onRunStart).not.toHaveBeenCalled();
    expect(second.flush).toHaveBeenCalledTimes(1);
  });

  it('rejects when a hook rejects', async () => {
    const hooks = new CompositeEventHooks([{ onRunComplete: () => Promise.reject(new Error('sink down')) }]);

    await expect(hooks.onRunComplete(completeEvent)).rejects.toThrow('sink down');
  });
});

describe('LoggingEventHooks', () => {
  it('logs run completion at info level', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ level: 'info', sink: (entry) => entries.push(entry) });
    const hooks = new LoggingEventHooks(logger);

    hooks.onRunStart({ runId: 'run-1', timestamp: completeEvent.timestamp, input: 'xml', hasCorrection: false });
    hooks.onRunComplete(completeEvent);

    expect(entries).toHaveLength(1);
    expect(entries[0]?.message).toBe('Run completed');
    expect(entries[0]?.context).toEqual({ runId: 'run-1', route: 'done', ok: true, durationMs: 12 });
  });
});

describe('createStepCompleteEvent', () => {
  it('summarizes an extraction result', () => {
    const result: ExtractionResult = {
      stepId: 'nfe-ledger/xml',
      status: 'failed',
      diagnostics: [
        { code: 'XML-SIZE', message: 'too large', severity: 'error', category: 'format', source: 'nfe-ledger/xml' },
      ],
      durationMs: 3,
      startedAt: completeEvent.timestamp,
      completedAt: completeEvent.timestamp,
    };

    const event = createStepCompleteEvent('run-1', result);

    expect(event).toMatchObject({
      runId: 'run-1',
      stepId: 'nfe-ledger/xml',
      status: 'failed',
      durationMs: 3,
      diagnosticCount: 1,
    });
  });
});
