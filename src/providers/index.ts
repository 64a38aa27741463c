// Provider Registry
// Lazily-built LLM providers, keyed by name

import type { Provider } from './types.js';
import { BedrockProvider } from './bedrock.js';
import { env, isClassifierConfigured } from '../env.js';
import { TriageError } from '../utils/errors.js';

const providers: Map<string, Provider> = new Map();

function createProvider(name: string): Provider | null {
  switch (name) {
    case 'bedrock':
      if (!isClassifierConfigured()) return null;
      return new BedrockProvider({
        region: env.BEDROCK_REGION,
        accessKeyId: env.AWS_ACCESS_KEY_ID,
        secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
      });
    default:
      return null;
  }
}

export function getProvider(name: string): Provider {
  const cached = providers.get(name);
  if (cached) return cached;

  const provider = createProvider(name);
  if (!provider) {
    throw TriageError.configuration(`Provider "${name}" is not available or not configured`);
  }

  providers.set(name, provider);
  return provider;
}

// Re-export types
export type { Provider, ProviderMessage, ProviderOptions, ProviderResponse } from './types.js';
