export { InlineDelivery } from "./adapters/delivery/inline-delivery"
export { MicrotaskDelivery } from "./adapters/delivery/microtask-delivery"
export {
  HttpImageFetcher,
  type HttpImageFetcherDeps,
  type HttpImageFetcherOptions,
} from "./adapters/http/http-image-fetcher"
export { SharpImageDecoder } from "./adapters/sharp/sharp-image-decoder"
export {
  createImageLoaderFromEnv,
  createImageLoaderServices,
  type ImageLoaderServiceOverrides,
  type ImageLoaderServices,
} from "./composition/create-image-loader-services"
export {
  ConfigError,
  type EnvConfig,
  envSchema,
  type ImageLoaderConfig,
  loadImageLoaderConfig,
  mapEnvToConfig,
} from "./config"
export { type ParsedImageKey, parseImageKey } from "./core/image-key"
export {
  ImageLoader,
  type ImageLoaderDeps,
  type ImageLoaderOptions,
} from "./core/image-loader"
export {
  contentTypeFor,
  copyDecodedImage,
  createDecodedImage,
  type DecodedImage,
  type ImageFormat,
  imageFormats,
} from "./model/decoded-image"
export {
  type DecodeFailureReason,
  ImageLoadError,
  type ImageLoadErrorCode,
  type InvalidKeyReason,
  type NetworkFailureReason,
} from "./model/image-load.errors"
export {
  type FailedState,
  isTerminal,
  type LoadedState,
  type LoadingState,
  type LoadState,
  type LoadStatus,
  type TerminalLoadState,
} from "./model/load-state"
export type { DeliveryContext } from "./ports/delivery-context"
export type { ImageCache } from "./ports/image-cache"
export type { ImageDecodeInput, ImageDecoder } from "./ports/image-decoder"
export type { FetchedImage, FetchImageOptions, ImageFetcher } from "./ports/image-fetcher"
export type { LoadHandle, LoadObserver } from "./ports/load-observer"
