import { createDecodedImage, type DecodedImage } from "../../model/decoded-image"
import type { ImageDecodeInput, ImageDecoder } from "../../ports/image-decoder"

/**
 * Accepts bodies of the form `png:<name>`. The image is one pixel tall and
 * as wide as the body is long.
 */
export class TextImageDecoder implements ImageDecoder {
  async decode(input: ImageDecodeInput): Promise<DecodedImage> {
    const text = new TextDecoder().decode(input.bytes)

    if (!text.startsWith("png:")) throw new Error("unrecognized image data")

    return createDecodedImage({
      bytes: input.bytes,
      contentType: "image/png",
      format: "png",
      width: input.bytes.byteLength,
      height: 1,
    })
  }
}
