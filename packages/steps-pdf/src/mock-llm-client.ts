import type { LlmClient, LlmRequest } from './types.js';

export interface MockLlmClientConfig {
  /** Response text, or an object serialized to JSON */
  response?: string | Record<string, unknown>;

  /** Error thrown instead of answering */
  error?: Error;

  model?: string;
}

/**
 * MockLlmClient answers with a fixed response and records every request.
 * It never touches the network.
 */
export class MockLlmClient implements LlmClient {
  readonly provider = 'mock';
  readonly model: string;
  readonly requests: LlmRequest[] = [];
  private readonly config: MockLlmClientConfig;

  constructor(config: MockLlmClientConfig = {}) {
    this.config = config;
    this.model = config.model ?? 'mock-model';
  }

  completeJson(request: LlmRequest): Promise<string> {
    this.requests.push(request);

    if (this.config.error) {
      return Promise.reject(this.config.error);
    }

    const { response } = this.config;
    if (response === undefined) {
      return Promise.resolve('{}');
    }
    return Promise.resolve(typeof response === 'string' ? response : JSON.stringify(response));
  }
}
