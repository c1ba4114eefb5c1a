import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError } from "./errors";
import type { HttpClient } from "./http";
import { logDebug, logInfo } from "./log";
import type { Narrator } from "./narration";
import { postText, postTextWithAudio } from "./webhook";

export type DeliveryMode = "stdout" | "webhook" | "narrated";

/** Narrated delivery runs these in order; cleaned_up is reached whenever audio was written. */
export type NarrationStage = "idle" | "script_generated" | "audio_synthesized" | "delivered" | "cleaned_up";

export interface DeliveryResult {
  mode: DeliveryMode;
  /** Webhook targets that accepted the post. */
  posted: number;
  stage?: NarrationStage;
}

export interface DeliveryOptions {
  /** Present when a narration key was given; switches delivery to narrated audio. */
  narrator?: Narrator;
  webhooks: readonly string[];
  http: HttpClient;
  stdout: (text: string) => void;
  signal?: AbortSignal;
  /** Where the temporary audio directory is created. Defaults to os.tmpdir(). */
  tmpRoot?: string;
}

export const AUDIO_FILENAME = "forecast.mp3";

export function validateDelivery(narrated: boolean, webhooks: readonly string[]): void {
  if (narrated && webhooks.length === 0) {
    throw new ConfigError("A narration key needs at least one webhook URL (--webhook) to deliver the audio to.");
  }
}

async function narrate(text: string, narrator: Narrator, options: DeliveryOptions): Promise<DeliveryResult> {
  let stage: NarrationStage = "idle";
  const advance = (next: NarrationStage) => {
    stage = next;
    logDebug(`narration: ${next}`);
  };

  const script = await narrator.writeScript(text, options.signal);
  advance("script_generated");
  const audio = await narrator.synthesize(script, options.signal);
  advance("audio_synthesized");

  const dir = mkdtempSync(join(options.tmpRoot ?? tmpdir(), "zipcast-"));
  let posted = 0;
  try {
    const audioPath = join(dir, AUDIO_FILENAME);
    writeFileSync(audioPath, audio);
    for (const url of options.webhooks) {
      await postTextWithAudio(options.http, url, text, audioPath);
      posted++;
    }
    advance("delivered");
  } finally {
    rmSync(dir, { recursive: true, force: true });
    advance("cleaned_up");
  }
  logInfo(`Posted narrated forecast to ${posted} webhook${posted === 1 ? "" : "s"}.`);
  return { mode: "narrated", posted, stage };
}

/**
 * Console when nothing else is configured; otherwise every webhook in order,
 * with narrated audio when a narrator is given.
 */
export async function deliver(text: string, options: DeliveryOptions): Promise<DeliveryResult> {
  validateDelivery(options.narrator != null, options.webhooks);

  if (options.narrator) return narrate(text, options.narrator, options);

  if (options.webhooks.length === 0) {
    options.stdout(text);
    return { mode: "stdout", posted: 0 };
  }

  let posted = 0;
  for (const url of options.webhooks) {
    await postText(options.http, url, text);
    posted++;
  }
  logInfo(`Posted forecast to ${posted} webhook${posted === 1 ? "" : "s"}.`);
  return { mode: "webhook", posted };
}
