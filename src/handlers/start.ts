import type { Chat } from '../bot/chat.js';

export const START_TEXT =
  "👋 Hi! Send me a YouTube (or other supported) link, and I'll let you choose the quality.";

export const HELP_TEXT =
  'Send me a link and pick a format from the buttons under the preview.\n\n' +
  '🎵 MP3 / Audio extracts the sound as an mp3.\n' +
  '🎬 A resolution downloads the video at that height as an mp4.';

export async function handleStart(chat: Chat): Promise<void> {
  await chat.sendText(START_TEXT);
}

export async function handleHelp(chat: Chat): Promise<void> {
  await chat.sendText(HELP_TEXT);
}
