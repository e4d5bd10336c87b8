export const imageFormats = ["jpeg", "png", "webp", "gif", "avif", "tiff", "svg", "heif"] as const

export type ImageFormat = (typeof imageFormats)[number]

/**
 * A fetched image whose bytes were recognized by a decoder.
 *
 * Instances are frozen. The cache keeps its own instance; observers receive
 * copies made with {@link copyDecodedImage}, so writing into `bytes` never
 * reaches the cached buffer.
 */
export type DecodedImage = Readonly<{
  bytes: Uint8Array
  contentType: string
  format: ImageFormat
  width: number
  height: number

  /** Cost charged against the cache's size bound. */
  byteLength: number
}>

export function createDecodedImage(input: Omit<DecodedImage, "byteLength">): DecodedImage {
  return Object.freeze({ ...input, byteLength: input.bytes.byteLength })
}

export function copyDecodedImage(image: DecodedImage): DecodedImage {
  return Object.freeze({ ...image, bytes: image.bytes.slice() })
}

const contentTypes: Record<ImageFormat, string> = {
  jpeg: "image/jpeg",
  png: "image/png",
  webp: "image/webp",
  gif: "image/gif",
  avif: "image/avif",
  tiff: "image/tiff",
  svg: "image/svg+xml",
  heif: "image/heif",
}

export function contentTypeFor(format: ImageFormat): string {
  return contentTypes[format]
}

export function isImageFormat(value: unknown): value is ImageFormat {
  return typeof value === "string" && (imageFormats as readonly string[]).includes(value)
}
