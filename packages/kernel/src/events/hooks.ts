/**
 * Workflow Event Hooks
 *
 * Observers of a workflow run. Hooks see identifiers, statuses, counts and
 * timings; never document content.
 *
 * @packageDocumentation
 */

import type { ExtractionResult } from '@nfe-ledger/contracts';
import type { Logger } from '@nfe-ledger/shared';

export type WorkflowRoute = 'done' | 'need_input' | 'human_review' | 'failed';

/**
 * Event emitted when a workflow run starts.
 */
export interface RunStartEvent {
  runId: string;
  timestamp: string;
  input: 'xml' | 'pdf' | 'none';
  hasCorrection: boolean;
}

/**
 * Event emitted when a workflow run completes.
 */
export interface RunCompleteEvent {
  runId: string;
  timestamp: string;
  durationMs: number;
  route: WorkflowRoute;
  ok: boolean;
}

/**
 * Event emitted when a step (extraction, classification or review) completes.
 */
export interface StepCompleteEvent {
  runId: string;
  timestamp: string;
  stepId: string;
  status: string;
  durationMs: number;
  diagnosticCount: number;
}

/**
 * Workflow event hooks. All methods are optional.
 */
export interface WorkflowEventHooks {
  onRunStart?(event: RunStartEvent): void | Promise<void>;
  onStepComplete?(event: StepCompleteEvent): void | Promise<void>;
  onRunComplete?(event: RunCompleteEvent): void | Promise<void>;
  /** Flush buffered events (called once a run has completed) */
  flush?(): Promise<void>;
}

/**
 * Dispatches every event to several hook implementations.
 */
export class CompositeEventHooks implements WorkflowEventHooks {
  private readonly hooks: readonly WorkflowEventHooks[];

  constructor(hooks: readonly WorkflowEventHooks[]) {
    this.hooks = hooks;
  }

  async onRunStart(event: RunStartEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onRunStart?.(event)));
  }

  async onStepComplete(event: StepCompleteEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onStepComplete?.(event)));
  }

  async onRunComplete(event: RunCompleteEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onRunComplete?.(event)));
  }

  async flush(): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.flush?.()));
  }
}

/**
 * No-op hooks (default).
 */
export class NoopEventHooks implements WorkflowEventHooks {}

/**
 * Hooks that write each event to a logger (useful for debugging).
 */
export class LoggingEventHooks implements WorkflowEventHooks {
  constructor(private readonly logger: Logger) {}

  onRunStart(event: RunStartEvent): void {
    this.logger.debug('Run started', { runId: event.runId, input: event.input });
  }

  onStepComplete(event: StepCompleteEvent): void {
    this.logger.debug('Step completed', {
      runId: event.runId,
      stepId: event.stepId,
      status: event.status,
      durationMs: event.durationMs,
    });
  }

  onRunComplete(event: RunCompleteEvent): void {
    this.logger.info('Run completed', {
      runId: event.runId,
      route: event.route,
      ok: event.ok,
      durationMs: event.durationMs,
    });
  }
}

/**
 * Create a step event from an extraction result.
 */
export function createStepCompleteEvent(runId: string, result: ExtractionResult): StepCompleteEvent {
  return {
    runId,
    timestamp: new Date().toISOString(),
    stepId: result.stepId,
    status: result.status,
    durationMs: result.durationMs,
    diagnosticCount: result.diagnostics.length,
  };
}
