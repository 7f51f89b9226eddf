/**
 * Platform-independent pieces of the Discord adapter: which messages the
 * bridge reacts to and how their text becomes a prompt.
 */

export const CANCEL_BUTTON_ID = "branchline:cancel";

export interface MessageFacts {
  authorIsBot: boolean;
  inThread: boolean;
  mentionsBot: boolean;
  content: string;
}

/** Drop `<@id>` and `<@!id>` mentions of the bot. */
export function stripBotMention(content: string, botId: string): string {
  return content.replace(new RegExp(`<@!?${botId}>`, "g"), "").trim();
}

export function shouldProcessMessage(msg: MessageFacts, options: { requireMention: boolean }): boolean {
  if (msg.authorIsBot) return false;
  if (!msg.content.trim()) return false;
  // Threads are conversations with the bridge already.
  if (msg.inThread) return true;
  return !options.requireMention || msg.mentionsBot;
}
