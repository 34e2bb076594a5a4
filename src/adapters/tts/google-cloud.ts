/**
 * Google Cloud Text-to-Speech adapter.
 * - With API key (GOOGLE_CLOUD_TTS_API_KEY): REST API.
 * - Without: @google-cloud/text-to-speech client on Application Default Credentials
 *   (GOOGLE_APPLICATION_CREDENTIALS).
 * LINEAR16 responses arrive as WAV files.
 */

import { TextToSpeechClient } from "@google-cloud/text-to-speech";
import { ServiceError } from "../../errors";
import type { ITTS, VoiceOptions } from "./types";

interface GoogleAudioConfig {
  audioEncoding: "LINEAR16";
  sampleRateHertz: number;
  speakingRate?: number;
  pitch?: number;
}

function buildAudioConfig(options?: VoiceOptions): GoogleAudioConfig {
  const audioConfig: GoogleAudioConfig = {
    audioEncoding: "LINEAR16",
    sampleRateHertz: options?.sampleRateHz ?? 16000,
  };
  if (options?.speakingRate != null) audioConfig.speakingRate = options.speakingRate;
  if (options?.pitch != null) audioConfig.pitch = options.pitch;
  return audioConfig;
}

export interface GoogleCloudTTSConfig {
  apiKey: string;
  voiceName?: string;
  languageCode?: string;
}

const SYNTHESIZE_URL = "https://texttospeech.googleapis.com/v1/text:synthesize";

/** TTS using REST API with API key. */
export class GoogleCloudTTS implements ITTS {
  constructor(private readonly config: GoogleCloudTTSConfig) {}

  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    const voiceName = options?.voiceName ?? this.config.voiceName ?? "en-US-Neural2-D";
    const languageCode = options?.languageCode ?? this.config.languageCode ?? "en-US";
    const audioConfig = buildAudioConfig(options);
    const url = `${SYNTHESIZE_URL}?key=${encodeURIComponent(this.config.apiKey)}`;
    const body = {
      input: { text },
      voice: { name: voiceName, languageCode },
      audioConfig,
    };
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
    if (!response.ok) {
      const errText = await response.text();
      throw new ServiceError("tts", `Google TTS failed: ${response.status} ${errText}`, {
        status: response.status,
        retryable: response.status >= 500 || response.status === 429,
      });
    }
    const data: unknown = await response.json();
    const b64 = typeof data === "object" && data !== null && "audioContent" in data ? data.audioContent : undefined;
    if (typeof b64 !== "string" || !b64) return Buffer.alloc(0);
    return Buffer.from(b64, "base64");
  }
}

/** TTS using official Node client and Application Default Credentials (OAuth2 / service account). */
export interface GoogleCloudTTSADCConfig {
  voiceName?: string;
  languageCode?: string;
}

export class GoogleCloudTTSADC implements ITTS {
  private readonly client: TextToSpeechClient;
  constructor(private readonly config: GoogleCloudTTSADCConfig = {}) {
    this.client = new TextToSpeechClient();
  }

  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    const voiceName = options?.voiceName ?? this.config.voiceName ?? "en-US-Neural2-D";
    const languageCode = options?.languageCode ?? this.config.languageCode ?? "en-US";
    const audioConfig = buildAudioConfig(options);
    const [response] = await this.client.synthesizeSpeech({
      input: { text },
      voice: { name: voiceName, languageCode },
      audioConfig,
    });
    const content = response.audioContent;
    if (!content || typeof content === "string") return Buffer.alloc(0);
    return Buffer.from(content);
  }
}
