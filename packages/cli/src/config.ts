/**
 * aclforge CLI: Render Option Resolution
 *
 * Resolves render options using the following precedence:
 *
 *   1. Command-line flags (--strict-protocols, --filter-scope, --remark-width)
 *   2. ACLFORGE_STRICT_PROTOCOLS, ACLFORGE_FILTER_SCOPE, ACLFORGE_REMARK_WIDTH
 *   3. DEFAULT_RENDER_OPTIONS
 *
 * Values from flags and environment arrive as text and are parsed here;
 * range checks are left to resolveRenderOptions().
 */

import { FILTER_SCOPES, InvalidRenderOptionsError, resolveRenderOptions } from '@aclforge/renderer';
import type { FilterScope, RenderOptions } from '@aclforge/renderer';

export const ENV_STRICT_PROTOCOLS = 'ACLFORGE_STRICT_PROTOCOLS';
export const ENV_FILTER_SCOPE = 'ACLFORGE_FILTER_SCOPE';
export const ENV_REMARK_WIDTH = 'ACLFORGE_REMARK_WIDTH';

/** Option values as commander hands them over. */
export interface RenderFlags {
  readonly strictProtocols?: boolean | undefined;
  readonly filterScope?: string | undefined;
  readonly remarkWidth?: string | undefined;
}

export type Environment = Readonly<Record<string, string | undefined>>;

const TRUE_VALUES: ReadonlySet<string> = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES: ReadonlySet<string> = new Set(['0', 'false', 'no', 'off', '']);

/** Read a boolean environment variable; undefined when unset. */
export function parseBoolean(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  throw new InvalidRenderOptionsError(`${name} must be true or false, got ${JSON.stringify(value)}`);
}

export function parseFilterScope(name: string, value: string | undefined): FilterScope | undefined {
  if (value === undefined) {
    return undefined;
  }
  const scope = FILTER_SCOPES.find((candidate) => candidate === value);
  if (scope === undefined) {
    throw new InvalidRenderOptionsError(
      `${name} must be one of ${FILTER_SCOPES.join(', ')}, got ${JSON.stringify(value)}`,
    );
  }
  return scope;
}

export function parseRemarkWidth(name: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidRenderOptionsError(`${name} must be a positive integer, got ${JSON.stringify(value)}`);
  }
  return Number(value.trim());
}

/**
 * Merge flags, environment and defaults into validated render options.
 *
 * @param env - Defaults to process.env; tests pass their own
 * @throws {InvalidRenderOptionsError} on unparseable or out-of-range values
 */
export function resolveCliOptions(flags: RenderFlags, env: Environment = process.env): RenderOptions {
  const strictProtocols =
    flags.strictProtocols ?? parseBoolean(ENV_STRICT_PROTOCOLS, env[ENV_STRICT_PROTOCOLS]);
  const filterScope =
    parseFilterScope('--filter-scope', flags.filterScope) ??
    parseFilterScope(ENV_FILTER_SCOPE, env[ENV_FILTER_SCOPE]);
  const remarkWidth =
    parseRemarkWidth('--remark-width', flags.remarkWidth) ??
    parseRemarkWidth(ENV_REMARK_WIDTH, env[ENV_REMARK_WIDTH]);

  const overrides: Partial<RenderOptions> = {
    ...(strictProtocols !== undefined ? { strictProtocols } : {}),
    ...(filterScope !== undefined ? { filterScope } : {}),
    ...(remarkWidth !== undefined ? { remarkWidth } : {}),
  };
  return resolveRenderOptions(overrides);
}
