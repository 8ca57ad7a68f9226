export { configSchema } from './schema.js'
export type { AppConfig, ConfigInput } from './schema.js'
export { loadConfig, parseConfig } from './loader.js'
export type { ConfigEnvironment, ResolvedConfig } from './loader.js'
