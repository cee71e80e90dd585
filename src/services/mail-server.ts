/**
 * Mail service: records messages in an in-memory outbox instead of sending them.
 */
import { CAPABILITIES } from "../capabilities/schemas.ts";
import { shortId } from "../infra/id.ts";
import { CapabilityServer, capabilityTool } from "./server.ts";

export const MAIL_SERVICE = "mail";

export interface SentMessage {
  messageId: string;
  recipient: string;
  subjectLine: string;
  body: string;
  sentAt: number;
}

export function createMailServer(
  options: { newMessageId?: () => string; clock?: () => number } = {},
): { server: CapabilityServer; outbox: readonly SentMessage[] } {
  const newMessageId = options.newMessageId ?? shortId;
  const clock = options.clock ?? Date.now;
  const outbox: SentMessage[] = [];

  const notify = capabilityTool("notify", CAPABILITIES.notify, ({ recipient, subject_line, body }) => {
    const message: SentMessage = {
      messageId: newMessageId(),
      recipient,
      subjectLine: subject_line,
      body,
      sentAt: clock(),
    };
    outbox.push(message);
    return { message_id: message.messageId };
  });

  return { server: new CapabilityServer(MAIL_SERVICE, [notify]), outbox };
}
