/**
 * TTS adapter factory. A selected provider without credentials degrades to StubTTS, whose
 * empty output the synthesis queue turns into the fallback tone.
 */

import type { AppConfig } from "../../config";
import { logger } from "../../logging";
import type { ITTS } from "./types";
import { StubTTS } from "./stub";
import { GoogleCloudTTS, GoogleCloudTTSADC } from "./google-cloud";
import { AzureTTS } from "./azure";

export type { ITTS, VoiceOptions } from "./types";
export { StubTTS } from "./stub";
export { GoogleCloudTTS, GoogleCloudTTSADC } from "./google-cloud";
export { AzureTTS } from "./azure";

export function createTTS(config: AppConfig): ITTS {
  const { provider, languageCode, googleApiKey, googleVoiceName, azureKey, azureRegion, azureVoiceName } = config.tts;
  switch (provider) {
    case "google":
      // Without a key the client library falls back to application default credentials.
      return googleApiKey
        ? new GoogleCloudTTS({ apiKey: googleApiKey, voiceName: googleVoiceName, languageCode })
        : new GoogleCloudTTSADC({ voiceName: googleVoiceName, languageCode });
    case "azure":
      if (azureKey && azureRegion) {
        return new AzureTTS({ key: azureKey, region: azureRegion, voiceName: azureVoiceName, languageCode });
      }
      logger.warn({ event: "TTS_PROVIDER_UNCONFIGURED", provider }, "Azure TTS needs a key and region; replies will use the fallback tone");
      return new StubTTS();
    case "stub":
      return new StubTTS();
  }
}
