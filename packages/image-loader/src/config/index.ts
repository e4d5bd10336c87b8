export { ConfigError } from "./config.errors"
export { loadImageLoaderConfig, mapEnvToConfig } from "./load-image-loader-config"
export { type EnvConfig, envSchema, type ImageLoaderConfig } from "./schema"
