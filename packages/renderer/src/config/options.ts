/**
 * aclforge Renderer: Render Options
 *
 * Pure, I/O-free defaults and validation for the options a render accepts.
 * Resolving options from flags and environment belongs to the CLI.
 */

import { InvalidRenderOptionsError } from '../errors.js';

/** Which filters of a policy a render emits. */
export type FilterScope = 'all' | 'first';

export const FILTER_SCOPES: ReadonlyArray<FilterScope> = ['all', 'first'];

export interface RenderOptions {
  /** Platform name matched against header targets and verbatim entries. */
  readonly platform: string;
  /** Maximum characters of one comment line in a `remark`. */
  readonly remarkWidth: number;
  /** Raise on protocol names missing from the protocol table. */
  readonly strictProtocols: boolean;
  /** `first` stops after the first targeted filter; `all` renders every filter. */
  readonly filterScope: FilterScope;
}

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  platform: 'cisco',
  remarkWidth: 100,
  strictProtocols: false,
  filterScope: 'all',
};

/**
 * Merge partial options onto the defaults.
 *
 * @throws {InvalidRenderOptionsError} when a value is out of range
 */
export function resolveRenderOptions(overrides: Partial<RenderOptions> = {}): RenderOptions {
  const options: RenderOptions = { ...DEFAULT_RENDER_OPTIONS, ...overrides };

  if (!Number.isInteger(options.remarkWidth) || options.remarkWidth < 1) {
    throw new InvalidRenderOptionsError(
      `remarkWidth must be a positive integer, got ${String(options.remarkWidth)}`,
    );
  }
  if (!FILTER_SCOPES.includes(options.filterScope)) {
    throw new InvalidRenderOptionsError(
      `filterScope must be one of ${FILTER_SCOPES.join(', ')}, got ${JSON.stringify(options.filterScope)}`,
    );
  }
  if (options.platform === '') {
    throw new InvalidRenderOptionsError('platform must not be empty');
  }
  return options;
}
