/**
 * Azure Cognitive Services Text-to-Speech adapter.
 * Uses REST API with subscription key; asks for a RIFF (WAV) response at the requested rate.
 */

import type { ITTS, VoiceOptions } from "./types";
import { ServiceError } from "../../errors";

const OUTPUT_FORMATS: Record<number, string> = {
  8000: "riff-8khz-16bit-mono-pcm",
  16000: "riff-16khz-16bit-mono-pcm",
  24000: "riff-24khz-16bit-mono-pcm",
  48000: "riff-48khz-16bit-mono-pcm",
};

export interface AzureTTSConfig {
  key: string;
  region: string;
  voiceName?: string;
  /** xml:lang of the SSML document (default en-US). */
  languageCode?: string;
}

export class AzureTTS implements ITTS {
  constructor(private readonly config: AzureTTSConfig) {}

  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    const voiceName = options?.voiceName ?? this.config.voiceName ?? "en-US-JennyNeural";
    const lang = options?.languageCode ?? this.config.languageCode ?? "en-US";
    const region = this.config.region;
    const outputFormat = OUTPUT_FORMATS[options?.sampleRateHz ?? 16000] ?? OUTPUT_FORMATS[16000];
    const url = `https://${region}.tts.speech.microsoft.com/cognitiveservices/v1`;
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Ocp-Apim-Subscription-Key": this.config.key,
        "Content-Type": "application/ssml+xml",
        "X-Microsoft-OutputFormat": outputFormat,
      },
      body: `<speak version='1.0' xml:lang='${lang}'><voice name='${voiceName}'>${escapeXml(text)}</voice></speak>`,
    });
    if (!response.ok) {
      throw new ServiceError("tts", `Azure TTS failed: ${response.status} ${response.statusText}`, {
        status: response.status,
        retryable: response.status >= 500 || response.status === 429,
      });
    }
    const arrayBuffer = await response.arrayBuffer();
    return Buffer.from(arrayBuffer);
  }
}

function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}
