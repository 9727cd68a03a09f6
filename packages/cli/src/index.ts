/**
 * @aclforge/cli
 *
 * The `aclforge` command-line front end and the pieces it is built from:
 * - JSON policy loading and structural validation
 * - Render option resolution from flags and environment
 * - A coloured console diagnostic sink
 */

export { PolicyFormatError, loadPolicyFile, parsePolicy, validatePolicyDocument } from './policy-loader.js';
export {
  ENV_FILTER_SCOPE,
  ENV_REMARK_WIDTH,
  ENV_STRICT_PROTOCOLS,
  parseBoolean,
  parseFilterScope,
  parseRemarkWidth,
  resolveCliOptions,
} from './config.js';
export type { Environment, RenderFlags } from './config.js';
export { ConsoleDiagnosticSink, formatDiagnostic } from './logging/console-sink.js';
export type { ConsoleSinkOptions } from './logging/console-sink.js';
export { renderCommand, runRender } from './commands/render.js';
export type { RenderCommandOptions } from './commands/render.js';
