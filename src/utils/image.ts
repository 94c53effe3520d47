import sharp from "sharp";
import type { ImageMediaType } from "./extract.js";

export const MAX_IMAGE_DIMENSION = 1024;
export const JPEG_QUALITY = 85;

export interface PreparedImage {
  data: Buffer;
  mediaType: ImageMediaType;
}

/**
 * Shrinks a photo to fit inside 1024x1024 and re-encodes it as JPEG so a
 * full-size phone picture stays under the model's upload limits. EXIF
 * rotation is applied and transparency is flattened onto white.
 */
export async function prepareImage(data: Buffer): Promise<PreparedImage> {
  const prepared = await sharp(data)
    .rotate()
    .resize(MAX_IMAGE_DIMENSION, MAX_IMAGE_DIMENSION, {
      fit: "inside",
      withoutEnlargement: true,
    })
    .flatten({ background: "#ffffff" })
    .jpeg({ quality: JPEG_QUALITY })
    .toBuffer();

  return { data: prepared, mediaType: "image/jpeg" };
}
