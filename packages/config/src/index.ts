export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { Config } from "./core/config"
export { ConfigError, type ConfigErrorCode } from "./core/errors"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export { type ParseDotenvOptions, parseDotenv } from "./core/parse-dotenv"
export type { IConfig } from "./ports/config"
export type { ConfigSource } from "./ports/source"
