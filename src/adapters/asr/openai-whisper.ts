/**
 * Whisper transcription over the OpenAI audio API.
 * Works against any OpenAI-compatible endpoint (set baseUrl, e.g. Groq).
 */

import OpenAI, { toFile } from "openai";
import type { IASR, TranscriptResult } from "./types";
import { pcmToWav } from "../../pipeline/audio-utils";

export interface OpenAIWhisperConfig {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  language?: string;
  sampleRateHz?: number;
}

export class OpenAIWhisperASR implements IASR {
  private client: OpenAI;

  constructor(private readonly config: OpenAIWhisperConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl, maxRetries: 0 });
  }

  async transcribe(audioBuffer: Buffer, format: string = "wav"): Promise<TranscriptResult> {
    const fmt = format.toLowerCase();
    const wav = fmt === "pcm16" || fmt === "pcm" ? pcmToWav(audioBuffer, this.config.sampleRateHz ?? 16000) : audioBuffer;
    const ext = fmt === "webm" ? "webm" : "wav";
    const transcription = await this.client.audio.transcriptions.create({
      file: await toFile(wav, `utterance.${ext}`),
      model: this.config.model ?? "whisper-1",
      response_format: "json",
      language: this.config.language,
      temperature: 0,
    });
    return { text: transcription.text.trim(), language: this.config.language };
  }
}
