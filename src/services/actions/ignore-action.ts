import type { ActionHandler } from './types.js';

export const ignoreAction: ActionHandler & { action: 'ignore' } = {
  action: 'ignore',
  failureLabel: 'ignored',
  async execute(_alert, decision) {
    return { label: 'ignored', detail: decision.reason };
  },
};
