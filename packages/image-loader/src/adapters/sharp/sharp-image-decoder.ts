import sharp, { type Metadata, type OutputInfo } from "sharp"
import {
  contentTypeFor,
  createDecodedImage,
  type DecodedImage,
  type ImageFormat,
  isImageFormat,
} from "../../model/decoded-image"
import { ImageLoadError } from "../../model/image-load.errors"
import type { ImageDecodeInput, ImageDecoder } from "../../ports/image-decoder"

/**
 * Identifies images by their bytes and decodes them in full, so truncated
 * or corrupt bodies are rejected. The response `content-type` is ignored in
 * favour of the detected format.
 */
export class SharpImageDecoder implements ImageDecoder {
  async decode(input: ImageDecodeInput): Promise<DecodedImage> {
    const { url, bytes, contentType } = input

    if (bytes.byteLength === 0) {
      throw ImageLoadError.decodeFailure({ url, reason: "empty_body", contentType })
    }

    let metadata: Metadata

    try {
      metadata = await sharp(bytes).metadata()
    } catch (err) {
      throw ImageLoadError.decodeFailure({ url, reason: "unreadable", contentType, cause: err })
    }

    const format = detectFormat(metadata)

    if (format === undefined) {
      throw ImageLoadError.decodeFailure({ url, reason: "unsupported_format", contentType })
    }

    // The header alone accepts truncated bodies; decode every pixel.
    let info: OutputInfo

    try {
      info = await decodePixels(bytes)
    } catch (err) {
      throw ImageLoadError.decodeFailure({ url, reason: "unreadable", contentType, cause: err })
    }

    const { width, height } = info

    return createDecodedImage({
      bytes,
      contentType: contentTypeFor(format),
      format,
      width,
      height,
    })
  }
}

async function decodePixels(bytes: Uint8Array): Promise<OutputInfo> {
  const { info } = await sharp(bytes, { failOn: "truncated" })
    .raw()
    .toBuffer({ resolveWithObject: true })

  return info
}

function detectFormat(metadata: Metadata): ImageFormat | undefined {
  // libheif reports AVIF as heif with av1 compression
  if (metadata.format === "heif" && metadata.compression === "av1") return "avif"

  return isImageFormat(metadata.format) ? metadata.format : undefined
}
