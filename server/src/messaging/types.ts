/**
 * Messaging Collaborator
 *
 * Whatever actually puts a reminder in front of the chat. Failures are
 * reported, not thrown: transient ones may be retried, permanent ones
 * mean the chat cannot be reached any more.
 */

export type DeliveryFailureKind = "transient" | "permanent";

export type SendResult =
  | { ok: true; messageId?: number }
  | {
      ok: false;
      kind: DeliveryFailureKind;
      error: string;
      /** Server-requested delay before trying again (ms) */
      retryAfterMs?: number;
    };

export interface Messenger {
  send(chatId: number, text: string, signal?: AbortSignal): Promise<SendResult>;
}
