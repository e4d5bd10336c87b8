import type { SizedCache } from "@picfetch/cache"
import type { DecodedImage } from "../model/decoded-image"

export type ImageCache = SizedCache<DecodedImage>
