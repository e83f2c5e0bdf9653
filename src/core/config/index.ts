export { loadConfig, loadConfigWithPath, CONFIG_FILENAMES, type LoadConfigOptions, type LoadedConfig } from './load'
export { default as validateConfig, parseTargets } from './validate'
