// Classifier selection: keyword rules for demo runs, Bedrock otherwise

import { getProvider } from '../../providers/index.js';
import { getModelFamily } from '../../providers/bedrock.js';
import type { ClassifierAdapter } from '../triage/types.js';
import { ModelClassifier } from './model-classifier.js';
import { RulesClassifier } from './rules-classifier.js';

export interface ClassifierSelection {
  demo: boolean;
  model: string;
}

export function createClassifier(selection: ClassifierSelection): ClassifierAdapter {
  if (selection.demo) {
    return new RulesClassifier();
  }
  // Unsupported model ids abort the session here, not per alert
  getModelFamily(selection.model);
  return new ModelClassifier(getProvider('bedrock'), { model: selection.model });
}

export { ModelClassifier } from './model-classifier.js';
export { RulesClassifier, classifyByRules } from './rules-classifier.js';
export { CLASSIFICATION_SYSTEM_PROMPT, buildClassificationPrompt } from './prompt.js';
