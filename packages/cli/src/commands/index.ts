export { startAgent } from './start.js';
export {
  configShow,
  resolveConfig,
  collectRawOptions,
  describeConfig,
  maskSecret,
  parseContainerId,
  parseExtensions,
  OPTION_SOURCES,
  type CliFlags,
  type OptionKey,
} from './config.js';
