/**
 * ASR adapter factory, plus the recognition-session helper the session controller uses.
 */

import type { AppConfig } from "../../config";
import { logger } from "../../logging";
import type { IASR, StreamingSession, StreamingSessionOptions } from "./types";
import { StubASR } from "./stub";
import { OpenAIWhisperASR } from "./openai-whisper";
import { WhisperLocalASR } from "./whisper-local";

export type { IASR, TranscriptResult, StreamingSession, StreamingSessionOptions, StreamingTranscriptPart } from "./types";
export { StubASR } from "./stub";
export { OpenAIWhisperASR } from "./openai-whisper";
export { WhisperLocalASR } from "./whisper-local";

export function createASR(config: AppConfig): IASR {
  const { provider, apiKey, baseUrl, model, language, whisperModel, whisperEngine, whisperPythonPath, workerScript } =
    config.asr;
  switch (provider) {
    case "openai":
      if (apiKey) return new OpenAIWhisperASR({ apiKey, baseUrl, model, language, sampleRateHz: config.audio.sampleRate });
      logger.warn({ event: "ASR_PROVIDER_UNCONFIGURED", provider }, "No API key for ASR; every transcript will be empty");
      return new StubASR();
    case "whisper-local":
      return new WhisperLocalASR({
        model: whisperModel || "base",
        engine: whisperEngine || "faster-whisper",
        pythonPath: whisperPythonPath,
        workerScript,
        sampleRateHz: config.audio.sampleRate,
      });
    case "stub":
      return new StubASR();
  }
}

/**
 * Start/feed/finalize lifecycle for any adapter. Streaming adapters are used directly;
 * batch adapters get a session that buffers PCM and transcribes it once at `end()`.
 */
export function openRecognitionSession(asr: IASR, options: StreamingSessionOptions = {}): StreamingSession {
  if (asr.createStreamingSession) return asr.createStreamingSession(options);
  const chunks: Buffer[] = [];
  let aborted = false;
  return {
    push: (chunk: Buffer) => {
      if (!aborted) chunks.push(chunk);
    },
    end: async () => {
      return asr.transcribe(Buffer.concat(chunks), "pcm16");
    },
    abort: () => {
      aborted = true;
      chunks.length = 0;
    },
  };
}
