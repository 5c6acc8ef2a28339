// src/services/imageIntake.ts
// Local validation of uploaded photos. Runs before any external call.

import sharp from "sharp";
import type { ImageFormat, ValidatedImage } from "../types/recipe";
import { ImageTooLargeError, UnsupportedFormatError } from "../utils/errors";

const MIME_BY_FORMAT: Record<ImageFormat, string> = {
  jpeg: "image/jpeg",
  png: "image/png",
  webp: "image/webp",
};

function isAllowedFormat(format: string | undefined): format is ImageFormat {
  return format !== undefined && Object.prototype.hasOwnProperty.call(MIME_BY_FORMAT, format);
}

export interface ImageIntakeOptions {
  maxImageBytes: number;
}

export class ImageIntake {
  constructor(private readonly options: ImageIntakeOptions) {}

  /**
   * Checks size first, then sniffs the real format from the bytes.
   * The declared content type is informational only.
   */
  async validate(bytes: Buffer, declaredMime?: string): Promise<ValidatedImage> {
    if (bytes.length > this.options.maxImageBytes) {
      throw new ImageTooLargeError(bytes.length, this.options.maxImageBytes);
    }
    if (bytes.length === 0) {
      throw new UnsupportedFormatError(null);
    }

    let metadata: sharp.Metadata;
    try {
      metadata = await sharp(bytes).metadata();
    } catch {
      throw new UnsupportedFormatError(null);
    }

    const format = metadata.format;
    if (!isAllowedFormat(format)) {
      throw new UnsupportedFormatError(format ?? null);
    }

    const mimeType = MIME_BY_FORMAT[format];
    if (declaredMime && declaredMime !== mimeType) {
      console.warn("[intake] declared mime differs from detected format", { declaredMime, detected: mimeType });
    }

    return {
      bytes,
      byteLength: bytes.length,
      format,
      mimeType,
      width: metadata.width,
      height: metadata.height,
    };
  }
}
