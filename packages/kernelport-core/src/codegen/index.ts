export { WgslGenerator, GenerationError, generate } from "./generator.js";
export type { GenerateOptions } from "./generator.js";
export {
  TranslatorConfigSchema,
  DEFAULT_CONFIG,
  ConfigError,
  parseTranslatorConfig,
  resolveConfig,
  mapType,
} from "./config.js";
export type { TranslatorConfig, TranslatorConfigInput, BuiltinMapping } from "./config.js";
