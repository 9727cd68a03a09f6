/**
 * aclforge render: Render a JSON policy as Cisco IOS access lists
 *
 * Usage:
 *   aclforge render <policy.json> [-o <file>] [--strict-protocols]
 *                   [--filter-scope all|first] [--remark-width <n>] [--verbose]
 *
 * The document goes to stdout unless -o is given. Diagnostics go to stderr:
 * warnings always, debug entries only with --verbose.
 */

import { writeFileSync } from 'node:fs';
import { Command } from 'commander';
import { renderPolicy } from '@aclforge/renderer';
import type { DiagnosticSink } from '@aclforge/renderer';
import { resolveCliOptions } from '../config.js';
import type { Environment, RenderFlags } from '../config.js';
import { ConsoleDiagnosticSink } from '../logging/console-sink.js';
import { loadPolicyFile } from '../policy-loader.js';
import { t } from '../theme.js';

export interface RenderCommandOptions extends RenderFlags {
  readonly output?: string | undefined;
  readonly verbose?: boolean | undefined;
}

/**
 * Load a policy file and render it.
 *
 * @throws {PolicyFormatError} when the file is not a valid policy
 * @throws {InvalidRenderOptionsError} on bad flags or environment values
 * @throws {AclForgeError} subclasses from the renderer
 */
export function runRender(
  policyPath: string,
  options: RenderCommandOptions,
  sink: DiagnosticSink,
  env?: Environment,
): string {
  const renderOptions = resolveCliOptions(options, env);
  return renderPolicy(loadPolicyFile(policyPath), renderOptions, sink);
}

export const renderCommand = new Command('render')
  .description('Render a JSON policy as Cisco IOS access lists')
  .argument('<policy>', 'Path to the resolved policy (JSON)')
  .option('-o, --output <file>', 'Write the document to a file instead of stdout')
  .option('--strict-protocols', 'Fail on protocol names missing from the protocol table')
  .option('--no-strict-protocols', 'Pass unknown protocol names through unchanged')
  .option('--filter-scope <scope>', 'Render all filters, or only the first (all | first)')
  .option('--remark-width <n>', 'Maximum characters of a remark line')
  .option('--verbose', 'Also print debug diagnostics')
  .action((policyPath: string, options: RenderCommandOptions) => {
    const sink = new ConsoleDiagnosticSink({ verbose: options.verbose === true });

    let document: string;
    try {
      document = runRender(policyPath, options, sink);
    } catch (error) {
      if (error instanceof Error) {
        // eslint-disable-next-line no-console
        console.error(t.red(`[aclforge render] ${error.message}`));
        process.exit(1);
      }
      throw error;
    }

    if (options.output === undefined) {
      process.stdout.write(document);
      return;
    }
    writeFileSync(options.output, document, 'utf-8');
    // eslint-disable-next-line no-console
    console.error(t.green(`Wrote ${options.output}`));
  });
