import OpenAI, { APIError, APIUserAbortError } from "openai";
import { ConfigError, InterruptedError, UpstreamError } from "./errors";
import { type Env, getEnv } from "./env";
import { logDebug } from "./log";

/** Turns rendered forecast text into a spoken script, then into audio. */
export interface Narrator {
  writeScript(text: string, signal?: AbortSignal): Promise<string>;
  synthesize(script: string, signal?: AbortSignal): Promise<Buffer>;
}

export const DEFAULT_NARRATOR_PROMPT = [
  "You are a cheerful local radio weather announcer.",
  "Rewrite the forecast you are given as a script to be read aloud in under a minute.",
  "Mention the place once, then walk through the days in order.",
  "Use plain spoken sentences only: no emoji, no markdown, no lists, no abbreviations like mph or °F.",
].join(" ");

export const TTS_MODELS = ["tts-1", "tts-1-hd"] as const;
export const TTS_VOICES = ["alloy", "echo", "fable", "onyx", "nova", "shimmer"] as const;

export type TtsModel = (typeof TTS_MODELS)[number];
export type TtsVoice = (typeof TTS_VOICES)[number];

export interface NarratorConfig {
  apiKey: string;
  baseURL?: string;
  model: string;
  ttsModel: TtsModel;
  voice: TtsVoice;
  prompt: string;
  timeoutMs: number;
}

function isTtsModel(v: string): v is TtsModel {
  return (TTS_MODELS as readonly string[]).includes(v);
}

function isTtsVoice(v: string): v is TtsVoice {
  return (TTS_VOICES as readonly string[]).includes(v);
}

/** Narrator settings from ZIPCAST_* env vars. The key itself comes from the CLI. */
export function readNarratorConfig(apiKey: string, env: Env = process.env): NarratorConfig {
  const ttsModel = getEnv("ZIPCAST_TTS_MODEL", env) ?? "tts-1";
  if (!isTtsModel(ttsModel)) {
    throw new ConfigError(`ZIPCAST_TTS_MODEL must be one of ${TTS_MODELS.join(", ")}; got "${ttsModel}".`);
  }
  const voice = getEnv("ZIPCAST_TTS_VOICE", env) ?? "onyx";
  if (!isTtsVoice(voice)) {
    throw new ConfigError(`ZIPCAST_TTS_VOICE must be one of ${TTS_VOICES.join(", ")}; got "${voice}".`);
  }
  return {
    apiKey,
    baseURL: getEnv("ZIPCAST_OPENAI_BASE_URL", env),
    model: getEnv("ZIPCAST_NARRATION_MODEL", env) ?? "gpt-4o-mini",
    ttsModel,
    voice,
    prompt: getEnv("ZIPCAST_NARRATOR_PROMPT", env) ?? DEFAULT_NARRATOR_PROMPT,
    timeoutMs: 30_000,
  };
}

/** SDK failures (bad key, rate limit, timeout) become UpstreamError; an abort stays an interruption. */
async function callOpenAi<T>(url: string, signal: AbortSignal | undefined, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (err) {
    if (err instanceof APIUserAbortError || signal?.aborted) throw new InterruptedError();
    if (err instanceof APIError) {
      throw new UpstreamError(`OpenAI request to ${url} failed: ${err.message}`, url, {
        status: err.status,
        cause: err,
      });
    }
    throw err;
  }
}

export function createOpenAiNarrator(config: NarratorConfig): Narrator {
  const openai = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    timeout: config.timeoutMs,
  });
  const apiBase = (config.baseURL ?? "https://api.openai.com/v1").replace(/\/+$/, "");

  return {
    async writeScript(text, signal) {
      logDebug(`narration script via ${config.model}`);
      const url = `${apiBase}/chat/completions`;
      const completion = await callOpenAi(url, signal, () =>
        openai.chat.completions.create(
          {
            model: config.model,
            messages: [
              { role: "system", content: config.prompt },
              { role: "user", content: text },
            ],
            stream: false,
            temperature: 0.7,
          },
          { signal }
        )
      );
      const content = completion.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new UpstreamError("No narration script returned from model.", url);
      }
      return content;
    },

    async synthesize(script, signal) {
      logDebug(`speech via ${config.ttsModel} (${config.voice})`);
      const url = `${apiBase}/audio/speech`;
      const audio = await callOpenAi(url, signal, async () => {
        const res = await openai.audio.speech.create(
          { model: config.ttsModel, voice: config.voice, input: script, response_format: "mp3" },
          { signal }
        );
        return Buffer.from(await res.arrayBuffer());
      });
      if (audio.length === 0) {
        throw new UpstreamError("Speech synthesis returned no audio.", url);
      }
      return audio;
    },
  };
}
