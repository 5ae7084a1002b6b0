import { Command, type IncomingMessage, type MessageAction, type MessageContext } from "./types";

// Checked in this order; the first prefix that matches wins.
const commands: readonly Command[] = [Command.START, Command.SET_API_KEY, Command.FORGET_KEY];

export function matchCommand(text: string): Command | undefined {
  return commands.find((command) => text.startsWith(command));
}

export function classifyMessage(message: IncomingMessage, ctx: MessageContext): MessageAction {
  // Blank text still counts as a text message.
  if (message.text !== undefined) {
    const text = message.text.trim();

    // Commands win over a pending credential.
    const command = matchCommand(text);
    if (command) return { kind: "command", command };

    if (ctx.pending) return { kind: "credential", value: text };

    return { kind: "chat", text };
  }

  const photo = message.photo;
  if (photo && photo.length > 0) {
    // Telegram lists sizes smallest first.
    const largest = photo[photo.length - 1];
    if (!largest) return { kind: "ignore" };

    const caption = message.caption?.trim();
    return caption ? { kind: "photo", fileId: largest.file_id, caption } : { kind: "photo", fileId: largest.file_id };
  }

  return { kind: "ignore" };
}
