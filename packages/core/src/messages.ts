export const START_TEXT = [
  "👋 Hi! I’m a Grok-powered bot via OpenRouter.",
  "",
  "I can:",
  "• Chat with you using text",
  "• Analyze images you send (photos)",
  "",
  "To use me, you need *your own* OpenRouter API key:",
  "1️⃣ Get an API key from OpenRouter.",
  "2️⃣ Use /set_api_key and send me your key.",
  "3️⃣ Then send text or photos and I’ll use Grok to respond.",
  "",
  "You can remove your key with /forget_key.",
].join("\n");

export const SET_API_KEY_TEXT = [
  "🔑 Please send me your *OpenRouter API key* as the **next message**.",
  "",
  "It will be kept only in memory in this simple version (if the bot restarts, you’ll need to set it again).",
  "",
  "You can clear it later with /forget_key.",
].join("\n");

export const KEY_SAVED_TEXT = "✅ Your OpenRouter API key has been saved.";

export const EMPTY_KEY_TEXT = "⚠️ That key was empty, so nothing was saved.\nUse /set_api_key to try again.";

export const KEY_REMOVED_TEXT = "✅ Your stored API key has been removed.";

export const MISSING_KEY_TEXT = "⚠️ You haven’t set an OpenRouter API key yet.\nUse /set_api_key first.";

export const IMAGE_FETCH_FAILED_TEXT = "❌ Couldn’t fetch the image from Telegram.";

export const DEFAULT_IMAGE_PROMPT =
  "Describe this image in detail and point out anything interesting or unusual.";
