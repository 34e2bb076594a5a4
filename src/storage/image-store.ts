/**
 * Camera image uploads: header-level validation (signature, size, dimensions), storage as a
 * session artifact, and loading for the chat call.
 */

import * as fs from "fs";
import * as path from "path";
import { logger } from "../logging";
import { ImageRejectedError, errorMessage } from "../errors";
import type { MessageImage } from "../adapters/llm";
import type { SessionRegistry } from "../session/registry";
import type { ImageArtifact, Session } from "../session/types";
import { artifactFileName, ensureDir, fileSize, removeFile } from "./artifacts";
import type { StorageQuotaManager } from "./quota-manager";

export interface ImageInfo {
  mimeType: "image/jpeg" | "image/png";
  ext: "jpg" | "png";
  width: number;
  height: number;
}

export interface ImageStoreConfig {
  maxBytes: number;
  maxDimension: number;
}

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

/** Width/height from the IHDR chunk, which always follows the signature. */
function pngSize(buf: Buffer): { width: number; height: number } | null {
  if (buf.length < 24 || buf.toString("ascii", 12, 16) !== "IHDR") return null;
  return { width: buf.readUInt32BE(16), height: buf.readUInt32BE(20) };
}

/** Width/height from the first SOFn marker. */
function jpegSize(buf: Buffer): { width: number; height: number } | null {
  let offset = 2;
  while (offset + 4 <= buf.length) {
    if (buf[offset] !== 0xff) return null;
    const marker = buf[offset + 1];
    // Fill bytes and standalone markers carry no length.
    if (marker === 0xff) {
      offset += 1;
      continue;
    }
    if (marker === 0xd8 || marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7)) {
      offset += 2;
      continue;
    }
    const length = buf.readUInt16BE(offset + 2);
    const isSof = marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc;
    if (isSof) {
      if (offset + 9 > buf.length) return null;
      return { height: buf.readUInt16BE(offset + 5), width: buf.readUInt16BE(offset + 7) };
    }
    if (marker === 0xda || length < 2) return null;
    offset += 2 + length;
  }
  return null;
}

/** Validate an upload by inspecting its header only. Throws ImageRejectedError (400). */
export function inspectImage(buf: Buffer, config: ImageStoreConfig): ImageInfo {
  if (buf.length === 0) throw new ImageRejectedError("Empty image");
  if (buf.length > config.maxBytes) {
    throw new ImageRejectedError(`Image too large: ${buf.length} bytes (max ${config.maxBytes})`);
  }
  let info: ImageInfo;
  if (buf.length >= 8 && buf.subarray(0, 8).equals(PNG_SIGNATURE)) {
    const size = pngSize(buf);
    if (!size) throw new ImageRejectedError("Corrupt PNG header");
    info = { mimeType: "image/png", ext: "png", ...size };
  } else if (buf.length >= 3 && buf[0] === 0xff && buf[1] === 0xd8 && buf[2] === 0xff) {
    const size = jpegSize(buf);
    if (!size) throw new ImageRejectedError("Corrupt JPEG header");
    info = { mimeType: "image/jpeg", ext: "jpg", ...size };
  } else {
    throw new ImageRejectedError("Unsupported image format (JPEG or PNG only)");
  }
  if (info.width === 0 || info.height === 0) throw new ImageRejectedError("Image has zero dimension");
  if (info.width > config.maxDimension || info.height > config.maxDimension) {
    throw new ImageRejectedError(
      `Image dimensions ${info.width}x${info.height} exceed ${config.maxDimension}x${config.maxDimension}`
    );
  }
  return info;
}

export class ImageStore {
  constructor(
    private readonly registry: SessionRegistry,
    private readonly quota: StorageQuotaManager,
    private readonly config: ImageStoreConfig
  ) {}

  /**
   * Validate, check quota, write, and make the image the session's current one
   * (the previous image file is deleted). Throws ImageRejectedError (400 or 507).
   */
  async save(session: Session, data: Buffer): Promise<ImageArtifact> {
    const info = inspectImage(data, this.config);
    const previous = session.image;
    const verdict = await this.quota.checkAdmission(session, data.length, await fileSize(previous?.path));
    if (!verdict.ok) {
      this.registry.logEvent(session, "image_rejected", { reason: `${verdict.scope} quota` });
      throw new ImageRejectedError(
        `Storage quota exceeded (${verdict.scope}: ${verdict.usageBytes} > ${verdict.limitBytes} bytes)`,
        507
      );
    }

    await ensureDir(this.quota.tempDir);
    const filename = artifactFileName("image", session.id, info.ext);
    const filePath = path.join(this.quota.tempDir, filename);
    await fs.promises.writeFile(filePath, data);

    const artifact: ImageArtifact = {
      path: filePath,
      filename,
      mimeType: info.mimeType,
      sizeBytes: data.length,
      width: info.width,
      height: info.height,
      uploadedAt: Date.now(),
    };
    session.image = artifact;
    session.cameraUploading = false;
    if (previous) await removeFile(previous.path);
    await this.quota.sessionUsage(session);
    this.registry.logEvent(session, "image_uploaded", {
      filename,
      sizeBytes: data.length,
      width: info.width,
      height: info.height,
    });
    logger.info(
      { event: "IMAGE_UPLOADED", sessionId: session.id, filename, sizeBytes: data.length, width: info.width, height: info.height },
      "Image uploaded"
    );
    return artifact;
  }

  /** Bytes and MIME type for the chat call; undefined when there is no readable image. */
  async prepareForChat(session: Session): Promise<MessageImage | undefined> {
    const image = session.image;
    if (!image) return undefined;
    try {
      const data = await fs.promises.readFile(image.path);
      return { data, mimeType: image.mimeType };
    } catch (err) {
      logger.warn({ event: "IMAGE_READ_FAILED", sessionId: session.id, err: errorMessage(err) }, "Could not read session image");
      return undefined;
    }
  }
}
