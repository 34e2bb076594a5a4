/**
 * Temp artifact naming and filesystem helpers.
 * Every artifact is `<kind>_<sessionId>_<timestampMs>.<ext>` directly under the temp dir.
 */

import * as fs from "fs";
import * as path from "path";
import { logger } from "../logging";
import { errorMessage } from "../errors";

export type ArtifactKind = "audio" | "image" | "tts";

export interface ArtifactName {
  kind: ArtifactKind;
  sessionId: string;
  timestamp: number;
  ext: string;
}

const ARTIFACT_RE = /^(audio|image|tts)_(.+)_(\d+)\.(\w+)$/;

let lastTimestamp = 0;

/** Strictly increasing millisecond stamp so two artifacts created in the same ms never collide. */
function nextTimestamp(): number {
  const now = Date.now();
  lastTimestamp = now > lastTimestamp ? now : lastTimestamp + 1;
  return lastTimestamp;
}

export function artifactFileName(kind: ArtifactKind, sessionId: string, ext: string): string {
  return `${kind}_${sessionId}_${nextTimestamp()}.${ext}`;
}

export function artifactPath(tempDir: string, kind: ArtifactKind, sessionId: string, ext: string): string {
  return path.join(tempDir, artifactFileName(kind, sessionId, ext));
}

export function parseArtifactName(fileName: string): ArtifactName | null {
  const m = ARTIFACT_RE.exec(fileName);
  if (!m) return null;
  const kind = m[1];
  if (kind !== "audio" && kind !== "image" && kind !== "tts") return null;
  return { kind, sessionId: m[2], timestamp: parseInt(m[3], 10), ext: m[4] };
}

export async function ensureDir(dir: string): Promise<void> {
  await fs.promises.mkdir(dir, { recursive: true });
}

/** Size on disk, 0 if the file does not exist. */
export async function fileSize(filePath: string | null | undefined): Promise<number> {
  if (!filePath) return 0;
  try {
    const st = await fs.promises.stat(filePath);
    return st.size;
  } catch (err) {
    if (isNotFound(err)) return 0;
    throw err;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/** Delete a file; a missing file is not an error. Returns true when something was removed. */
export async function removeFile(filePath: string | null | undefined): Promise<boolean> {
  if (!filePath) return false;
  try {
    await fs.promises.unlink(filePath);
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    logger.warn({ event: "ARTIFACT_DELETE_FAILED", filePath, err: errorMessage(err) }, "Could not delete artifact");
    return false;
  }
}

export function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
