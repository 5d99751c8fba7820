/**
 * NF-e Workflow
 *
 * Extraction (XML or PDF), then classification, then routing:
 * - `done`: the classification passed the confidence gate
 * - `need_input`: review is needed and no correction was supplied
 * - `human_review`: review is needed and a correction was supplied
 * - `failed`: no document could be extracted
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type {
  ClassificationResult,
  CorrectionRecord,
  Diagnostic,
  DocumentSourceKind,
  ExtractionResult,
  ExtractionStep,
  FiscalDocument,
  MappingStore,
  TaxRegime,
} from '@nfe-ledger/contracts';
import {
  buildReviewSummary,
  classifyDocument,
  regimeLabel,
  resolveReview,
  type PendingReview,
} from '@nfe-ledger/classifier';
import { createPdfExtractionStep, type LlmSettings } from '@nfe-ledger/steps-pdf';
import { createXmlExtractionStep } from '@nfe-ledger/steps-xml';
import { createSafeLogger, defaultIdGenerator, generateRunId, type IdGenerator, type Logger } from '@nfe-ledger/shared';
import type { WorkflowConfig } from '../config/effective-config.js';
import {
  NoopEventHooks,
  createStepCompleteEvent,
  type RunStartEvent,
  type StepCompleteEvent,
  type RunCompleteEvent,
  type WorkflowEventHooks,
  type WorkflowRoute,
} from '../events/hooks.js';
import { createMappingStore } from './mapping-store-factory.js';

export const CLASSIFY_STEP_ID = 'nfe-ledger/classify';
export const REVIEW_STEP_ID = 'nfe-ledger/review';

export interface WorkflowInput {
  xmlPath?: string;
  /** Takes precedence over `xmlPath` */
  pdfPath?: string;
  regime?: TaxRegime | null;
  correction?: CorrectionRecord | null;
}

export interface WorkflowResult {
  runId: string;
  ok: boolean;
  route: WorkflowRoute;
  document?: FiscalDocument;
  classification?: ClassificationResult;
  /** Set while the document waits for a human decision */
  pending?: PendingReview;
  humanReviewPending: boolean;
  humanReviewApplied: boolean;
  reviewSummary?: string;
  error?: string;
  diagnostics: Diagnostic[];
}

export interface NfeWorkflowOptions {
  store: MappingStore;
  xmlStep: ExtractionStep;
  pdfStep: ExtractionStep;
  hooks?: WorkflowEventHooks;
  logger?: Logger;
  idGenerator?: IdGenerator;
  /** Called by {@link NfeWorkflow.close} */
  onClose?: () => Promise<void>;
}

function firstErrorMessage(result: ExtractionResult): string {
  const error = result.diagnostics.find((d) => d.severity === 'error');
  return error?.message ?? `Extraction ${result.status}`;
}

export class NfeWorkflow {
  private readonly store: MappingStore;
  private readonly steps: Readonly<Record<DocumentSourceKind, ExtractionStep>>;
  private readonly hooks: WorkflowEventHooks;
  private readonly logger: Logger;
  private readonly idGenerator: IdGenerator;
  private readonly onClose: (() => Promise<void>) | undefined;

  constructor(options: NfeWorkflowOptions) {
    this.store = options.store;
    this.steps = { xml: options.xmlStep, pdf: options.pdfStep };
    this.hooks = options.hooks ?? new NoopEventHooks();
    this.logger = options.logger ?? createSafeLogger({ prefix: 'nfe-ledger:workflow' });
    this.idGenerator = options.idGenerator ?? defaultIdGenerator;
    this.onClose = options.onClose;
  }

  /**
   * Run one document through the workflow. Never rejects for document or
   * configuration problems; they are reported in the result.
   */
  async run(input: WorkflowInput): Promise<WorkflowResult> {
    const startTime = Date.now();
    const runId = generateRunId({ idGenerator: this.idGenerator });
    const kind: DocumentSourceKind | null =
      input.pdfPath !== undefined ? 'pdf' : input.xmlPath !== undefined ? 'xml' : null;
    const correction = input.correction ?? null;

    const startEvent: RunStartEvent = {
      runId,
      timestamp: new Date().toISOString(),
      input: kind ?? 'none',
      hasCorrection: correction !== null,
    };
    await this.notify('onRunStart', () => this.hooks.onRunStart?.(startEvent));

    const result = await this.execute(runId, kind, input, correction);

    const completeEvent: RunCompleteEvent = {
      runId,
      timestamp: new Date().toISOString(),
      durationMs: Date.now() - startTime,
      route: result.route,
      ok: result.ok,
    };
    await this.notify('onRunComplete', () => this.hooks.onRunComplete?.(completeEvent));
    await this.notify('flush', () => this.hooks.flush?.());

    return result;
  }

  /** Release the mapping store's resources */
  async close(): Promise<void> {
    if (this.onClose) {
      await this.onClose();
    }
  }

  private async execute(
    runId: string,
    kind: DocumentSourceKind | null,
    input: WorkflowInput,
    correction: CorrectionRecord | null,
  ): Promise<WorkflowResult> {
    const failed = (error: string, diagnostics: Diagnostic[] = []): WorkflowResult => ({
      runId,
      ok: false,
      route: 'failed',
      humanReviewPending: false,
      humanReviewApplied: false,
      error,
      diagnostics,
    });

    const path = kind === 'pdf' ? input.pdfPath : input.xmlPath;
    if (kind === null || path === undefined) {
      this.logger.warn('No input document', { runId });
      return failed('missing input: provide xmlPath or pdfPath');
    }

    // Step 1: Extraction
    let content: Uint8Array;
    try {
      content = await readFile(path);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Cannot read input document', { runId, kind });
      return failed(`Cannot read input document: ${message}`);
    }

    const step = this.steps[kind];
    const extraction = await step.execute({ content, fileName: basename(path), kind });
    await this.stepComplete(createStepCompleteEvent(runId, extraction));

    const document = extraction.document;
    if (extraction.status !== 'passed' || document === undefined) {
      this.logger.warn('Extraction did not produce a document', {
        runId,
        stepId: extraction.stepId,
        status: extraction.status,
      });
      return failed(firstErrorMessage(extraction), extraction.diagnostics);
    }

    // Step 2: Classification
    const regime = input.regime ?? null;
    const classifyStart = Date.now();
    const classification = await classifyDocument(document, { store: this.store, regime, logger: this.logger });
    await this.stepComplete({
      runId,
      timestamp: new Date().toISOString(),
      stepId: CLASSIFY_STEP_ID,
      status: classification.needsHumanReview ? 'review' : 'passed',
      durationMs: Date.now() - classifyStart,
      diagnosticCount: 0,
    });

    const base = { runId, document, diagnostics: extraction.diagnostics };

    // Step 3: Routing
    if (!classification.needsHumanReview) {
      return {
        ...base,
        ok: true,
        route: 'done',
        classification,
        humanReviewPending: false,
        humanReviewApplied: false,
      };
    }

    const pending: PendingReview = {
      cfop: classification.cfop,
      regime: regimeLabel(regime),
      reason: classification.reviewReason,
      classification,
    };
    const reviewSummary = buildReviewSummary(document, classification);

    if (correction === null) {
      this.logger.info('Classification awaits human review', { runId, cfop: pending.cfop, regime: pending.regime });
      return {
        ...base,
        ok: true,
        route: 'need_input',
        classification,
        pending,
        humanReviewPending: true,
        humanReviewApplied: false,
        reviewSummary,
      };
    }

    const reviewStart = Date.now();
    const resolution = await resolveReview({ document, pending, correction, store: this.store, logger: this.logger });
    await this.stepComplete({
      runId,
      timestamp: new Date().toISOString(),
      stepId: REVIEW_STEP_ID,
      status: resolution.ok ? 'passed' : 'failed',
      durationMs: Date.now() - reviewStart,
      diagnosticCount: resolution.ok ? 0 : 1,
    });

    if (!resolution.ok) {
      return {
        ...base,
        ok: false,
        route: 'human_review',
        classification,
        pending: resolution.pending,
        humanReviewPending: true,
        humanReviewApplied: false,
        reviewSummary,
        error: resolution.error,
      };
    }

    return {
      ...base,
      ok: true,
      route: 'human_review',
      classification: resolution.classification,
      humanReviewPending: false,
      humanReviewApplied: true,
    };
  }

  private stepComplete(event: StepCompleteEvent): Promise<void> {
    return this.notify('onStepComplete', () => this.hooks.onStepComplete?.(event));
  }

  private async notify(hook: keyof WorkflowEventHooks, call: () => void | Promise<void> | undefined): Promise<void> {
    try {
      await call();
    } catch (error) {
      this.logger.warn('Event hook failed', {
        hook,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

export interface CreateWorkflowOptions {
  hooks?: WorkflowEventHooks;
  logger?: Logger;
  /** Replaces the store selected from configuration */
  store?: MappingStore;
}

/**
 * Build the LLM settings for the configured provider.
 */
export function llmSettingsFromConfig(config: WorkflowConfig): LlmSettings {
  const provider = config.pdf.llmProvider;
  const settings: LlmSettings = { provider, temperature: config.pdf.llmTemperature };
  if (config.pdf.llmModel !== null) settings.model = config.pdf.llmModel;
  const apiKey = config.apiKeys[provider];
  if (apiKey !== null) settings.apiKey = apiKey;
  return settings;
}

/**
 * Wire a workflow from effective configuration.
 *
 * @example
 * ```typescript
 * const { config } = buildEffectiveConfig(loadEnvironment());
 * const workflow = createWorkflow(config);
 * const result = await workflow.run({ xmlPath: 'nota.xml', regime: 'simples' });
 * await workflow.close();
 * ```
 */
export function createWorkflow(config: WorkflowConfig, options: CreateWorkflowOptions = {}): NfeWorkflow {
  const logger = options.logger ?? createSafeLogger({ prefix: 'nfe-ledger:workflow', level: config.logLevel });
  let store = options.store;
  let onClose: (() => Promise<void>) | undefined;
  if (store === undefined) {
    const handle = createMappingStore(config, logger);
    store = handle.store;
    onClose = () => handle.close();
  }

  const workflowOptions: NfeWorkflowOptions = {
    store,
    xmlStep: createXmlExtractionStep({ logger: logger.child({ step: 'xml' }) }),
    pdfStep: createPdfExtractionStep({
      logger: logger.child({ step: 'pdf' }),
      llmEnabled: config.pdf.llmEnabled,
      llm: llmSettingsFromConfig(config),
      ocrEnabled: config.pdf.ocrEnabled,
      ocrLanguage: config.pdf.ocrLanguage,
      placeholderItem: config.pdf.placeholderItem,
    }),
    logger,
  };
  if (options.hooks !== undefined) workflowOptions.hooks = options.hooks;
  if (onClose !== undefined) workflowOptions.onClose = onClose;

  return new NfeWorkflow(workflowOptions);
}
