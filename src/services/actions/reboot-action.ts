import type { ActionHandler } from './types.js';
import { postJson } from './http.js';

export interface RebootActionOptions {
  simulate: boolean;
  webhookUrl?: string;
}

export function restartCommand(deviceName: string): string {
  return `Restart-Computer -ComputerName ${deviceName} -Force`;
}

export function createRebootAction(options: RebootActionOptions): ActionHandler & { action: 'reboot' } {
  return {
    action: 'reboot',
    failureLabel: 'reboot_failed',
    async execute(alert, decision, signal) {
      const { webhookUrl } = options;
      if (options.simulate || !webhookUrl) {
        return { label: 'reboot_simulated', detail: restartCommand(alert.device_name) };
      }

      const status = await postJson(
        webhookUrl,
        {
          device: alert.device_name,
          alert_id: alert.id,
          command: restartCommand(alert.device_name),
          reason: decision.reason,
        },
        { failureLabel: 'reboot_failed', networkLabel: 'reboot_failed' },
        signal
      );

      return { label: 'reboot_triggered', detail: `reboot webhook responded ${status}` };
    },
  };
}
