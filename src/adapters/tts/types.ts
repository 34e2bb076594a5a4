/**
 * TTS (text-to-speech) adapter types.
 * Implementations are selected via TTS_PROVIDER (Google Cloud, Azure, stub).
 */

export interface VoiceOptions {
  /** Voice name or id (provider-specific). */
  voiceName?: string;
  /** Language code (e.g. en-US). */
  languageCode?: string;
  /** Output sample rate in Hz (default 16000, what the device plays). */
  sampleRateHz?: number;
  speakingRate?: number;
  pitch?: number;
}

/**
 * TTS adapter interface: text in, audio out.
 * The buffer is either a complete WAV file or raw PCM16 mono at `sampleRateHz`;
 * an empty buffer means the engine produced nothing.
 */
export interface ITTS {
  synthesize(text: string, options?: VoiceOptions): Promise<Buffer>;
}
