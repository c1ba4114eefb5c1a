import { readFileSync } from "node:fs";
import { basename } from "node:path";
import type { HttpClient } from "./http";

export const WEBHOOK_TIMEOUT_MS = 15_000;

/** Text-only post: `{ "content": text }` as JSON. */
export async function postText(http: HttpClient, url: string, text: string): Promise<void> {
  await http.send(
    url,
    {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ content: text }),
    },
    { timeoutMs: WEBHOOK_TIMEOUT_MS }
  );
}

/** Multipart post: `content` field with the text and `file` with the audio read from disk. */
export async function postTextWithAudio(
  http: HttpClient,
  url: string,
  text: string,
  audioPath: string
): Promise<void> {
  const form = new FormData();
  form.append("content", text);
  form.append("file", new Blob([readFileSync(audioPath)], { type: "audio/mpeg" }), basename(audioPath));
  // fetch sets the multipart boundary header itself.
  await http.send(url, { method: "POST", body: form }, { timeoutMs: WEBHOOK_TIMEOUT_MS });
}

/** Split a comma-separated URL list, dropping blanks. */
export function parseWebhookList(raw: string): string[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}
