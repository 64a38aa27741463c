// Action handlers - one per triage action

import type { TriageConfig } from '../triage/types.js';
import type { ActionHandlerTable } from './types.js';
import { createRebootAction } from './reboot-action.js';
import { createNotifyClientAction } from './notify-client-action.js';
import { createTicketAction } from './create-ticket-action.js';
import { ignoreAction } from './ignore-action.js';

export function createActionHandlers(config: TriageConfig): ActionHandlerTable {
  return {
    reboot: createRebootAction({
      simulate: config.simulateActions,
      webhookUrl: config.rebootWebhookUrl,
    }),
    notify_client: createNotifyClientAction({
      simulate: config.simulateActions,
      emailDomain: config.clientEmailDomain,
      webhookUrl: config.notifyWebhookUrl,
    }),
    create_ticket: createTicketAction(config.ticketWebhookUrl),
    ignore: ignoreAction,
  };
}

export { buildTicketPayload } from './create-ticket-action.js';
export { buildClientNotification } from './notify-client-action.js';
export type { ActionEffect, ActionHandler, ActionHandlerTable } from './types.js';
