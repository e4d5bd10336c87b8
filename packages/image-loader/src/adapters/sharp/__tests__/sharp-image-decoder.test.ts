import sharp from "sharp"
import { ImageLoadError } from "../../../model/image-load.errors"
import { SharpImageDecoder } from "../sharp-image-decoder"

const A = "https://cdn.test/a.png"

function canvas(width: number, height: number) {
  return sharp({
    create: { width, height, channels: 4, background: { r: 255, g: 0, b: 0, alpha: 1 } },
  })
}

async function captureError(promise: Promise<unknown>): Promise<ImageLoadError> {
  try {
    await promise
  } catch (err) {
    if (err instanceof ImageLoadError) return err
    throw err
  }
  throw new Error("expected the promise to reject")
}

describe("SharpImageDecoder", () => {
  const decoder = new SharpImageDecoder()

  it("decodes a PNG", async () => {
    const bytes = new Uint8Array(await canvas(4, 3).png().toBuffer())

    const image = await decoder.decode({ url: A, bytes, contentType: "image/png" })

    expect(image).toEqual({
      bytes,
      contentType: "image/png",
      format: "png",
      width: 4,
      height: 3,
      byteLength: bytes.byteLength,
    })
    expect(Object.isFrozen(image)).toBe(true)
  })

  it.each([
    ["jpeg", "image/jpeg"],
    ["webp", "image/webp"],
  ] as const)("detects %s regardless of the declared content type", async (format, contentType) => {
    const bytes = new Uint8Array(await canvas(2, 2).toFormat(format).toBuffer())

    const image = await decoder.decode({ url: A, bytes, contentType: "application/octet-stream" })

    expect(image.format).toBe(format)
    expect(image.contentType).toBe(contentType)
    expect(image.width).toBe(2)
  })

  it("rejects a truncated PNG whose header is intact", async () => {
    const full = await canvas(64, 64).png().toBuffer()
    const bytes = new Uint8Array(full.subarray(0, Math.floor(full.length / 2)))

    const err = await captureError(decoder.decode({ url: A, bytes, contentType: "image/png" }))

    expect(err.code).toBe("decode_error")
    expect(err.context).toEqual({ url: A, reason: "unreadable", contentType: "image/png" })
  })

  it("rejects an empty body", async () => {
    const err = await captureError(
      decoder.decode({ url: A, bytes: new Uint8Array(), contentType: "image/png" }),
    )

    expect(err.code).toBe("decode_error")
    expect(err.context).toEqual({ url: A, reason: "empty_body", contentType: "image/png" })
  })

  it("rejects bytes that are not an image", async () => {
    const bytes = new TextEncoder().encode("<html><body>not found</body></html>")

    const err = await captureError(decoder.decode({ url: A, bytes, contentType: "text/html" }))

    expect(err.code).toBe("decode_error")
    expect(err.context).toEqual({ url: A, reason: "unreadable", contentType: "text/html" })
    expect(err.cause).toBeInstanceOf(Error)
  })
})
