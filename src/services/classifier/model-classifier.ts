import type { Provider } from '../../providers/types.js';
import type { ClassifierAdapter } from '../triage/types.js';
import { CLASSIFICATION_SYSTEM_PROMPT, buildClassificationPrompt } from './prompt.js';

export interface ModelClassifierOptions {
  model: string;
  maxTokens?: number;
}

/**
 * Sends the alert text to an LLM provider and hands back its raw reply.
 * Parsing and validation are left to the response validator.
 */
export class ModelClassifier implements ClassifierAdapter {
  name: string;
  private provider: Provider;
  private model: string;
  private maxTokens: number;

  constructor(provider: Provider, options: ModelClassifierOptions) {
    this.provider = provider;
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 1000;
    this.name = `${provider.name}:${options.model}`;
  }

  async classify(text: string, signal?: AbortSignal): Promise<string> {
    const response = await this.provider.sendChat(
      [
        { role: 'system', content: CLASSIFICATION_SYSTEM_PROMPT },
        { role: 'user', content: buildClassificationPrompt(text) },
      ],
      {
        model: this.model,
        maxTokens: this.maxTokens,
        temperature: 0,
        signal,
      }
    );

    return response.content;
  }
}
