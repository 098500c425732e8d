import { CHAT_MESSAGES_MAX } from "../constants.js";

export function appendChatMessage(
  messages: readonly string[],
  message: string,
  capacity = CHAT_MESSAGES_MAX
): string[] {
  const next = [...messages, message];
  return next.length > capacity ? next.slice(next.length - capacity) : next;
}
