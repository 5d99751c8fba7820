/**
 * Language model clients
 *
 * OpenAI and Groq go through the OpenAI SDK (Groq exposes an OpenAI-compatible
 * endpoint); Gemini goes through @google/genai. Every client asks for a JSON
 * answer and returns the raw response text.
 */

import OpenAI from 'openai';
import { GoogleGenAI } from '@google/genai';
import { ConfigurationError, ExtractionError } from '@nfe-ledger/shared';
import { DEFAULT_LLM_MODELS, type LlmClient, type LlmProvider, type LlmRequest, type LlmSettings } from './types.js';

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

/**
 * Environment variable holding each provider's API key
 */
export const API_KEY_VARIABLES: Readonly<Record<LlmProvider, string>> = {
  openai: 'OPENAI_API_KEY',
  groq: 'GROQ_API_KEY',
  gemini: 'GOOGLE_API_KEY',
};

function emptyResponse(provider: LlmProvider): ExtractionError {
  return new ExtractionError(`${provider} returned an empty response`, 'llm', { reason: 'empty-response', provider });
}

/**
 * Chat completions client for OpenAI and Groq
 */
export class OpenAiCompatibleClient implements LlmClient {
  private readonly client: OpenAI;

  constructor(
    readonly provider: 'openai' | 'groq',
    readonly model: string,
    private readonly temperature: number,
    apiKey: string,
  ) {
    this.client = new OpenAI(provider === 'groq' ? { apiKey, baseURL: GROQ_BASE_URL } : { apiKey });
  }

  async completeJson(request: LlmRequest): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      temperature: this.temperature,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.user },
      ],
    });

    const content = completion.choices[0]?.message.content;
    if (!content) {
      throw emptyResponse(this.provider);
    }
    return content;
  }
}

/**
 * Gemini client
 */
export class GeminiClient implements LlmClient {
  readonly provider = 'gemini';
  private readonly ai: GoogleGenAI;

  constructor(
    readonly model: string,
    private readonly temperature: number,
    apiKey: string,
  ) {
    this.ai = new GoogleGenAI({ apiKey });
  }

  async completeJson(request: LlmRequest): Promise<string> {
    const response = await this.ai.models.generateContent({
      model: this.model,
      contents: request.user,
      config: {
        systemInstruction: request.system,
        responseMimeType: 'application/json',
        temperature: this.temperature,
      },
    });

    const text = response.text;
    if (!text) {
      throw emptyResponse(this.provider);
    }
    return text;
  }
}

/**
 * Build the client for a provider.
 *
 * @throws ConfigurationError when the provider's API key is missing or the temperature is invalid
 */
export function createLlmClient(settings: LlmSettings): LlmClient {
  const { provider } = settings;
  const model = settings.model ?? DEFAULT_LLM_MODELS[provider];
  const temperature = settings.temperature ?? 0;

  if (!Number.isFinite(temperature) || temperature < 0 || temperature > 2) {
    throw new ConfigurationError(`LLM temperature must be between 0 and 2 (got ${String(temperature)})`, {
      provider,
    });
  }

  const apiKey = settings.apiKey?.trim();
  if (!apiKey) {
    throw new ConfigurationError(`${API_KEY_VARIABLES[provider]} is not configured`, { provider });
  }

  switch (provider) {
    case 'openai':
    case 'groq':
      return new OpenAiCompatibleClient(provider, model, temperature, apiKey);
    case 'gemini':
      return new GeminiClient(model, temperature, apiKey);
  }
}
