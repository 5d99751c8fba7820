/**
 * @nfe-ledger/kernel
 *
 * Workflow orchestration: extraction, classification and human review
 * routing, wired from effective configuration.
 *
 * @packageDocumentation
 */

export {
  NfeWorkflow,
  createWorkflow,
  llmSettingsFromConfig,
  CLASSIFY_STEP_ID,
  REVIEW_STEP_ID,
} from './workflow/workflow.js';
export type { WorkflowInput, WorkflowResult, NfeWorkflowOptions, CreateWorkflowOptions } from './workflow/workflow.js';

export { createMappingStore, type MappingStoreHandle } from './workflow/mapping-store-factory.js';

export { buildEffectiveConfig, loadEnvironment, DEFAULT_WORKFLOW_CONFIG } from './config/effective-config.js';

export type {
  EffectiveConfig,
  EnvironmentSource,
  LoadEnvironmentOptions,
  PdfWorkflowConfig,
  WorkflowConfig,
  WorkflowConfigOverrides,
} from './config/effective-config.js';

// Event Hooks
export {
  CompositeEventHooks,
  NoopEventHooks,
  LoggingEventHooks,
  createStepCompleteEvent,
} from './events/hooks.js';

export type {
  WorkflowEventHooks,
  WorkflowRoute,
  RunStartEvent,
  RunCompleteEvent,
  StepCompleteEvent,
} from './events/hooks.js';
