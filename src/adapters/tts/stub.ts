/**
 * Stub TTS adapter for testing or when no provider is configured.
 * Returns a fixed buffer (empty by default, which the synthesis queue replaces with a tone).
 */

import type { ITTS, VoiceOptions } from "./types";

export class StubTTS implements ITTS {
  constructor(private readonly audio: Buffer = Buffer.alloc(0)) {}

  async synthesize(_text: string, _options?: VoiceOptions): Promise<Buffer> {
    return this.audio;
  }
}
