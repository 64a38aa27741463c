// Keyword rules classifier
// Deterministic stand-in for the model in demo mode. Keywords match anywhere
// in the lowercased text; rules are checked in order and the first match wins.

import type { ClassifierAdapter, Confidence, TriageAction } from '../triage/types.js';

interface ClassificationRule {
  pattern: RegExp;
  action: TriageAction;
  reason: string;
  confidence: Confidence;
}

const RULES: ClassificationRule[] = [
  {
    pattern: /reboot|restart|pending reboot|windows update|security update/,
    action: 'reboot',
    reason: 'System requires a restart to finish applying updates',
    confidence: 'High',
  },
  {
    pattern: /service stopped|sql server|database|critical error|system down/,
    action: 'create_ticket',
    reason: 'Critical service failure requires immediate technician attention',
    confidence: 'High',
  },
  {
    pattern: /disk space|storage|drive full|documents folder/,
    action: 'notify_client',
    reason: 'Storage is running low and needs client cleanup',
    confidence: 'High',
  },
  {
    pattern: /offline|printer|network|connectivity|unreachable/,
    action: 'create_ticket',
    reason: 'Connectivity issue requires technician investigation',
    confidence: 'Medium',
  },
  {
    pattern: /security|failed login|firewall|blocked/,
    action: 'create_ticket',
    reason: 'Security alert requires investigation',
    confidence: 'High',
  },
  {
    pattern: /antivirus update|temporary|low battery|retry|informational/,
    action: 'ignore',
    reason: 'Transient condition that clears on its own',
    confidence: 'Medium',
  },
];

const DEFAULT_RULE: Omit<ClassificationRule, 'pattern'> = {
  action: 'create_ticket',
  reason: 'Unknown issue pattern requires technician review',
  confidence: 'Low',
};

export function classifyByRules(text: string): Omit<ClassificationRule, 'pattern'> {
  const haystack = text.toLowerCase();
  const match = RULES.find(rule => rule.pattern.test(haystack));
  if (!match) return DEFAULT_RULE;
  return { action: match.action, reason: match.reason, confidence: match.confidence };
}

export class RulesClassifier implements ClassifierAdapter {
  name = 'rules';

  async classify(text: string): Promise<string> {
    return JSON.stringify(classifyByRules(text));
  }
}
