/**
 * Env-based configuration for the capture gateway.
 * Load from .env.local (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export const ASR_PROVIDERS = ["openai", "whisper-local", "stub"] as const;
export const LLM_PROVIDERS = ["openai", "anthropic", "stub"] as const;
export const TTS_PROVIDERS = ["google", "azure", "stub"] as const;
export const GAP_POLICIES = ["append", "drop-stale"] as const;

export type AsrProvider = (typeof ASR_PROVIDERS)[number];
export type LlmProvider = (typeof LLM_PROVIDERS)[number];
export type TtsProvider = (typeof TTS_PROVIDERS)[number];
/** What to do with chunks older than the expected sequence number. Forward gaps are always appended. */
export type GapPolicy = (typeof GAP_POLICIES)[number];

export interface AppConfig {
  /** WebSocket + HTTP listener and admission policy */
  server: {
    host: string;
    port: number;
    /** Upgrade path for device connections (default /ws). */
    wsPath: string;
    /** Shared secret the device presents as ?token= or Authorization header. */
    wsToken: string;
    maxConnections: number;
    /** Refuse a second session while another one is bound, even below maxConnections. */
    singleSessionMode: boolean;
    /** Prefix for offer_download URLs (e.g. http://192.168.1.10:8000). Empty = relative URL. */
    publicBaseUrl: string;
  };

  /** Inbound PCM16 stream */
  audio: {
    sampleRate: number;
    /** Chunk size used by the device and for outbound TTS slices. */
    chunkSizeBytes: number;
    /** Forward gap (in chunks) tolerated without flagging. */
    seqTolerance: number;
    /** Ack every N accepted chunks. */
    ackEvery: number;
    gapPolicy: GapPolicy;
  };

  /** Temp artifact store */
  storage: {
    tempDir: string;
    maxSessionDiskMb: number;
    maxStoreDiskMb: number;
    /** Idle time after which a session (and its files) may be reclaimed. */
    sessionGraceSec: number;
    /** Registry idle sweep interval. */
    sweepIntervalSec: number;
    /** Quota manager reclamation interval. */
    storageSweepIntervalSec: number;
  };

  session: {
    maxRerecordAttempts: number;
    /** Turns kept in a session's conversation history. */
    maxHistoryTurns: number;
    /** Turns sent to the LLM with each request. */
    historyWindow: number;
    minTranscriptChars: number;
    /** Offer a download if the device has not asked for playback within this time. */
    playbackReadyTimeoutSec: number;
  };

  image: {
    maxBytes: number;
    maxDimension: number;
  };

  /** ASR (speech-to-text) provider and options */
  asr: {
    provider: AsrProvider;
    apiKey?: string;
    /** OpenAI-compatible endpoint (e.g. https://api.groq.com/openai/v1). */
    baseUrl?: string;
    model: string;
    language?: string;
    whisperModel?: string;
    whisperEngine?: string;
    whisperPythonPath?: string;
    /** Worker script for whisper-local (default scripts/whisper_local_worker.py). */
    workerScript?: string;
  };

  /** LLM provider and options */
  llm: {
    provider: LlmProvider;
    openaiApiKey?: string;
    baseUrl?: string;
    openaiModel: string;
    /** Tried once after the primary model exhausts its retries. */
    fallbackModel?: string;
    anthropicApiKey?: string;
    anthropicModel: string;
    retryAttempts: number;
    maxTokens: number;
    systemPrompt?: string;
  };

  /** TTS (text-to-speech) provider and options */
  tts: {
    provider: TtsProvider;
    /** Voice language for every provider (default en-US). */
    languageCode: string;
    googleApiKey?: string;
    googleVoiceName?: string;
    azureKey?: string;
    azureRegion?: string;
    azureVoiceName?: string;
    sampleRate: number;
    /** Delay between outbound TTS chunks. */
    pacingMs: number;
  };

  /** Timeouts for external calls */
  timeouts: {
    asrMs: number;
    llmMs: number;
    ttsMs: number;
  };

  downloads: {
    ttlSec: number;
  };
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

function getEnvInt(key: string, defaultValue: number): number {
  const v = getEnv(key);
  if (v == null) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) ? defaultValue : n;
}

function getEnvBool(key: string, defaultValue: boolean): boolean {
  const v = getEnv(key);
  if (v == null) return defaultValue;
  return v === "true" || v === "1";
}

function getEnvChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
  const v = getEnv(key);
  return choices.find((c) => c === v) ?? defaultValue;
}

/**
 * Build config from environment variables.
 * ASR_PROVIDER, LLM_PROVIDER, TTS_PROVIDER select adapters (openai, whisper-local, anthropic, google, azure, stub).
 */
export function loadConfig(): AppConfig {
  const groqKey = getEnv("GROQ_API_KEY");
  return {
    server: {
      host: getEnv("HOST") || "0.0.0.0",
      port: getEnvInt("PORT", 8000),
      wsPath: getEnv("WEBSOCKET_PATH") || "/ws",
      wsToken: getEnv("WS_TOKEN") || "",
      maxConnections: getEnvInt("MAX_CONNECTIONS", 1),
      singleSessionMode: getEnvBool("SINGLE_SESSION_MODE", true),
      publicBaseUrl: getEnv("PUBLIC_BASE_URL") || "",
    },
    audio: {
      sampleRate: getEnvInt("AUDIO_SAMPLE_RATE", 16000),
      chunkSizeBytes: getEnvInt("CHUNK_SIZE_BYTES", 16000),
      seqTolerance: getEnvInt("AUDIO_SEQ_TOLERANCE", 5),
      ackEvery: getEnvInt("AUDIO_ACK_EVERY", 4),
      gapPolicy: getEnvChoice("AUDIO_GAP_POLICY", GAP_POLICIES, "append"),
    },
    storage: {
      tempDir: path.resolve(getEnv("TEMP_DIR") || "./temp"),
      maxSessionDiskMb: getEnvInt("MAX_SESSION_DISK_MB", 100),
      maxStoreDiskMb: getEnvInt("MAX_STORE_DISK_MB", 500),
      sessionGraceSec: getEnvInt("SESSION_GRACE_SEC", 30),
      sweepIntervalSec: getEnvInt("SESSION_SWEEP_INTERVAL_SEC", 60),
      storageSweepIntervalSec: getEnvInt("STORAGE_SWEEP_INTERVAL_SEC", 300),
    },
    session: {
      maxRerecordAttempts: getEnvInt("MAX_RERECORD_ATTEMPTS", 2),
      maxHistoryTurns: getEnvInt("MAX_HISTORY_TURNS", 10),
      historyWindow: getEnvInt("LLM_HISTORY_WINDOW", 5),
      minTranscriptChars: getEnvInt("MIN_TRANSCRIPT_CHARS", 3),
      playbackReadyTimeoutSec: getEnvInt("PLAYBACK_READY_TIMEOUT_SEC", 5),
    },
    image: {
      maxBytes: getEnvInt("MAX_IMAGE_SIZE_BYTES", 2 * 1024 * 1024),
      maxDimension: getEnvInt("IMAGE_MAX_DIMENSION", 1600),
    },
    asr: {
      provider: getEnvChoice("ASR_PROVIDER", ASR_PROVIDERS, "openai"),
      apiKey: getEnv("ASR_API_KEY") || groqKey || getEnv("OPENAI_API_KEY"),
      baseUrl: getEnv("ASR_BASE_URL") || (groqKey ? "https://api.groq.com/openai/v1" : undefined),
      model: getEnv("ASR_MODEL") || (groqKey ? "whisper-large-v3-turbo" : "whisper-1"),
      language: getEnv("STT_LANGUAGE") || "en",
      whisperModel: getEnv("WHISPER_MODEL"),
      whisperEngine: getEnv("WHISPER_ENGINE"),
      whisperPythonPath: getEnv("WHISPER_PYTHON_PATH"),
      workerScript: getEnv("WHISPER_WORKER_SCRIPT"),
    },
    llm: {
      provider: getEnvChoice("LLM_PROVIDER", LLM_PROVIDERS, "openai"),
      openaiApiKey: getEnv("LLM_API_KEY") || groqKey || getEnv("OPENAI_API_KEY"),
      baseUrl: getEnv("LLM_BASE_URL") || (groqKey ? "https://api.groq.com/openai/v1" : undefined),
      openaiModel: getEnv("LLM_MODEL") || (groqKey ? "meta-llama/llama-4-maverick-17b-128e-instruct" : "gpt-4o-mini"),
      fallbackModel: getEnv("LLM_FALLBACK_MODEL"),
      anthropicApiKey: getEnv("ANTHROPIC_API_KEY"),
      anthropicModel: getEnv("ANTHROPIC_MODEL_NAME") || "claude-3-5-sonnet-20241022",
      retryAttempts: getEnvInt("LLM_RETRY_ATTEMPTS", 3),
      maxTokens: getEnvInt("LLM_MAX_TOKENS", 1024),
      systemPrompt: getEnv("LLM_SYSTEM_PROMPT"),
    },
    tts: {
      provider: getEnvChoice("TTS_PROVIDER", TTS_PROVIDERS, "stub"),
      languageCode: getEnv("TTS_LANGUAGE_CODE") || "en-US",
      googleApiKey: getEnv("GOOGLE_CLOUD_TTS_API_KEY"),
      googleVoiceName: getEnv("GOOGLE_TTS_VOICE_NAME") || "en-US-Neural2-D",
      azureKey: getEnv("AZURE_TTS_KEY"),
      azureRegion: getEnv("AZURE_TTS_REGION"),
      azureVoiceName: getEnv("AZURE_TTS_VOICE_NAME"),
      sampleRate: getEnvInt("TTS_SAMPLE_RATE", 16000),
      pacingMs: getEnvInt("TTS_PACING_MS", 10),
    },
    timeouts: {
      asrMs: getEnvInt("ASR_TIMEOUT_MS", 20_000),
      llmMs: getEnvInt("LLM_TIMEOUT_MS", 60_000),
      ttsMs: getEnvInt("TTS_TIMEOUT_MS", 30_000),
    },
    downloads: {
      ttlSec: getEnvInt("PLAYBACK_URL_EXP_SEC", 300),
    },
  };
}

/**
 * Sanity checks run at startup. Returns human-readable problems; an empty list means the config is usable.
 */
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];
  if (!config.server.wsToken) errors.push("WS_TOKEN is not set; every device connection will be refused");
  if (config.server.port < 0 || config.server.port > 65535) {
    errors.push(`PORT ${config.server.port} is not in valid range (0-65535)`);
  }
  if (config.server.maxConnections < 1) errors.push("MAX_CONNECTIONS must be >= 1");
  if (config.audio.chunkSizeBytes <= 0) {
    errors.push("CHUNK_SIZE_BYTES must be > 0");
  } else if (config.audio.chunkSizeBytes > 1024 * 1024) {
    errors.push("CHUNK_SIZE_BYTES seems too large (> 1MB)");
  } else if (config.audio.chunkSizeBytes % 2 !== 0) {
    errors.push("CHUNK_SIZE_BYTES must be a multiple of 2 (PCM16)");
  }
  if (config.audio.ackEvery < 1) errors.push("AUDIO_ACK_EVERY must be >= 1");
  if (config.asr.provider === "openai" && !config.asr.apiKey) {
    errors.push("ASR_PROVIDER=openai but no ASR_API_KEY / GROQ_API_KEY / OPENAI_API_KEY is set");
  }
  if (config.llm.provider === "openai" && !config.llm.openaiApiKey) {
    errors.push("LLM_PROVIDER=openai but no LLM_API_KEY / GROQ_API_KEY / OPENAI_API_KEY is set");
  }
  if (config.llm.provider === "anthropic" && !config.llm.anthropicApiKey) {
    errors.push("LLM_PROVIDER=anthropic but ANTHROPIC_API_KEY is not set");
  }
  if (config.tts.provider === "azure" && (!config.tts.azureKey || !config.tts.azureRegion)) {
    errors.push("TTS_PROVIDER=azure needs AZURE_TTS_KEY and AZURE_TTS_REGION");
  }
  return errors;
}
