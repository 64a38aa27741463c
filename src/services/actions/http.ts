// JSON webhook client shared by the ticket, reboot and notification actions

import { ActionFailure, describeError } from '../../utils/errors.js';

const USER_AGENT = 'alert-triage/1.0';

/**
 * POSTs `payload` as JSON. Resolves with the HTTP status on a 2xx response.
 * Non-2xx responses raise `ActionFailure(failureLabel, "<status>")`; transport
 * errors raise `ActionFailure(networkLabel, <message>)`.
 */
export async function postJson(
  url: string,
  payload: unknown,
  labels: { failureLabel: string; networkLabel: string },
  signal?: AbortSignal
): Promise<number> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        'User-Agent': USER_AGENT,
      },
      body: JSON.stringify(payload),
      signal,
    });
  } catch (error) {
    throw new ActionFailure(labels.networkLabel, describeError(error));
  }

  if (!response.ok) {
    throw new ActionFailure(labels.failureLabel, String(response.status));
  }

  return response.status;
}
