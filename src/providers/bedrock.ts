// AWS Bedrock Provider
// Uses @aws-sdk/client-bedrock-runtime for Claude and Mistral models

import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { z } from 'zod';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse, ProviderUsage } from './types.js';
import { TriageError } from '../utils/errors.js';

export type BedrockModelFamily = 'claude' | 'mistral';

export interface BedrockProviderOptions {
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
}

// Claude: { content: [{ type: "text", text: "..." }], usage: { input_tokens, output_tokens } }
const ClaudeResponseSchema = z.object({
  content: z.array(z.object({ text: z.string().optional() })).default([]),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
    })
    .optional(),
});

// Mistral: { choices: [{ message: { content: "..." } }] }
const MistralResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }).optional() }))
    .default([]),
});

export function getModelFamily(modelId: string): BedrockModelFamily {
  if (modelId.includes('anthropic.claude')) return 'claude';
  if (modelId.includes('mistral')) return 'mistral';
  throw TriageError.configuration(`Unsupported Bedrock model family: ${modelId}`);
}

const estimateTokens = (text: string) => Math.ceil(text.length / 4);

export function formatBedrockRequest(
  family: BedrockModelFamily,
  messages: ProviderMessage[],
  options: ProviderOptions
): Record<string, unknown> {
  if (family === 'claude') {
    const systemMsg = messages.find(m => m.role === 'system');
    return {
      anthropic_version: 'bedrock-2023-05-31',
      max_tokens: options.maxTokens ?? 1000,
      temperature: options.temperature ?? 0,
      messages: messages
        .filter(m => m.role !== 'system')
        .map(m => ({ role: m.role, content: m.content })),
      ...(systemMsg ? { system: systemMsg.content } : {}),
    };
  }

  return {
    messages: messages.map(m => ({ role: m.role, content: m.content })),
    max_tokens: options.maxTokens ?? 1000,
    temperature: options.temperature ?? 0,
  };
}

export function parseBedrockResponse(
  family: BedrockModelFamily,
  body: unknown,
  messages: ProviderMessage[]
): ProviderResponse {
  let content: string;
  let usage: ProviderUsage;

  if (family === 'claude') {
    const parsed = ClaudeResponseSchema.parse(body);
    content = parsed.content[0]?.text ?? '';
    const promptTokens = parsed.usage?.input_tokens ?? 0;
    const completionTokens = parsed.usage?.output_tokens ?? 0;
    usage = { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
  } else {
    const parsed = MistralResponseSchema.parse(body);
    content = parsed.choices[0]?.message?.content ?? '';
    // Mistral doesn't return token counts in response, estimate
    const promptTokens = estimateTokens(messages.map(m => m.content).join(''));
    const completionTokens = estimateTokens(content);
    usage = { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
  }

  return { content, usage };
}

export class BedrockProvider implements Provider {
  name = 'bedrock';
  private client: BedrockRuntimeClient;

  constructor(options: BedrockProviderOptions) {
    if (!options.accessKeyId || !options.secretAccessKey || !options.region) {
      throw TriageError.configuration('AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY, and BEDROCK_REGION are required');
    }

    this.client = new BedrockRuntimeClient({
      region: options.region,
      credentials: {
        accessKeyId: options.accessKeyId,
        secretAccessKey: options.secretAccessKey,
      },
    });
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const family = getModelFamily(options.model);

    const command = new InvokeModelCommand({
      modelId: options.model,
      contentType: 'application/json',
      accept: 'application/json',
      body: JSON.stringify(formatBedrockRequest(family, messages, options)),
    });

    let responseBody: unknown;
    try {
      const response = await this.client.send(command, { abortSignal: options.signal });
      responseBody = JSON.parse(new TextDecoder().decode(response.body));
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') throw error;
      throw TriageError.classifierTransport(
        `Bedrock invocation failed: ${error instanceof Error ? error.message : String(error)}`,
        { modelId: options.model }
      );
    }

    return parseBedrockResponse(family, responseBody, messages);
  }
}
