import type { DecodedImage } from "../model/decoded-image"

export type ImageDecodeInput = {
  url: string
  bytes: Uint8Array
  contentType: string | undefined
}

export interface ImageDecoder {
  /**
   * Rejects when `bytes` are not an image the decoder supports.
   */
  decode(input: ImageDecodeInput): Promise<DecodedImage>
}
