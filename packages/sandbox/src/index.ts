export { SandboxPlugin, type SandboxPluginOptions } from './plugin.js'
export { SandboxExtractor, type RequestCapture, type SandboxRequestContext, type SandboxResponse } from './extractor.js'
export { parseSandboxConfig, sandboxConfigSchema, type SandboxLogLevel, type SandboxSettings } from './config.js'
export { createHostLogger } from './logger.js'
export {
  Feature,
  HostLogLevel,
  REQUEST_KIND,
  RESPONSE_KIND,
  type HostFunctions,
  type HostLogLevelValue,
  type MessageKind
} from './host.js'
