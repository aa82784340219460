export { loadConfig, type LoadConfigOptions, type BrowserPaths } from './load'
export { default as validateConfig } from './validate'
export { ConfigLoadError, ConfigValidationError } from './errors'
