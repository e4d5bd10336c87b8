import {
  contentTypeFor,
  copyDecodedImage,
  createDecodedImage,
  imageFormats,
} from "../decoded-image"

describe("createDecodedImage", () => {
  it("derives byteLength from the bytes and freezes the result", () => {
    const image = createDecodedImage({
      bytes: new Uint8Array(12),
      contentType: "image/gif",
      format: "gif",
      width: 2,
      height: 2,
    })

    expect(image.byteLength).toBe(12)
    expect(Object.isFrozen(image)).toBe(true)
  })
})

describe("contentTypeFor", () => {
  it("maps every format to an image MIME type", () => {
    for (const format of imageFormats) {
      expect(contentTypeFor(format)).toMatch(/^image\//)
    }
    expect(contentTypeFor("svg")).toBe("image/svg+xml")
  })
})

describe("copyDecodedImage", () => {
  it("copies the bytes into a new frozen image", () => {
    const image = createDecodedImage({
      bytes: new Uint8Array([1, 2, 3]),
      contentType: "image/png",
      format: "png",
      width: 1,
      height: 1,
    })

    const copy = copyDecodedImage(image)
    copy.bytes[0] = 9

    expect(image.bytes).toEqual(new Uint8Array([1, 2, 3]))
    expect(copy).toMatchObject({ byteLength: 3, width: 1, height: 1 })
    expect(Object.isFrozen(copy)).toBe(true)
  })
})
