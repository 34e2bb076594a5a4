/**
 * ASR (speech-to-text) adapter types.
 * Implementations are selected via ASR_PROVIDER (OpenAI-compatible Whisper API, local Whisper worker, stub).
 */

export interface TranscriptResult {
  /** Transcribed text. */
  text: string;
  /** Optional language code. */
  language?: string;
}

/**
 * Interim hypothesis from a streaming-capable recognizer.
 *
 * Whisper hypotheses may revise earlier text; consumers must not assume partials are append-only.
 */
export interface StreamingTranscriptPart {
  text: string;
  /** True once the recognizer will not revise this text. */
  isFinal: boolean;
  language?: string;
}

export interface StreamingSessionOptions {
  /** Sample rate of the PCM pushed into the session (default 16000). */
  sampleRateHz?: number;
  /** Called with interim hypotheses; the final transcript is still returned by `end()`. */
  onPartial?: (part: StreamingTranscriptPart) => void;
}

/**
 * One recording's worth of recognition.
 * `push` takes raw PCM16 mono little-endian; `end` yields the final transcript.
 * `abort` discards buffered audio without recognizing it.
 */
export interface StreamingSession {
  push(chunk: Buffer): void;
  end(): Promise<TranscriptResult>;
  abort(): void;
}

export interface IASR {
  /**
   * Transcribe a complete utterance.
   * @param format - "wav" (default) or "pcm16" (16 kHz mono).
   */
  transcribe(audioBuffer: Buffer, format?: string): Promise<TranscriptResult>;

  /**
   * Streaming recognition. Adapters that only transcribe whole files omit this;
   * `openRecognitionSession` then buffers the audio for them.
   */
  createStreamingSession?(options: StreamingSessionOptions): StreamingSession;

  /** Release long-lived resources (worker processes). */
  close?(): Promise<void>;
}
