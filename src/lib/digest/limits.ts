// Group-chat text messages are rejected well before 30k characters on most
// webhook bots; stay comfortably under that.
export const MAX_WEBHOOK_CHARS = 20_000;
