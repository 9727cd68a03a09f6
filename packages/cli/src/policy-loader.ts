/**
 * aclforge CLI: Policy Loader
 *
 * Reads an already-resolved policy serialised as JSON and validates its
 * structure into the Policy model. Symbolic names must already be expanded:
 * addresses arrive as prefixes, optionally carrying the token they came from.
 *
 *   {
 *     "filters": [{
 *       "header": { "targets": [{ "platform": "cisco", "options": ["edge-in", "object-group"] }] },
 *       "terms": [{
 *         "name": "allow-web",
 *         "action": "accept",
 *         "protocol": ["tcp"],
 *         "sourceAddress": ["10.0.0.0/8", { "address": "172.16.0.0/12", "parentToken": "corp-src" }],
 *         "destinationPort": [80, [8000, 8080], { "low": 443, "high": 443 }]
 *       }]
 *     }]
 *   }
 *
 * Validation collects every structural error, each located by its JSON path,
 * rather than stopping at the first.
 */

import { readFileSync } from 'node:fs';
import {
  AclForgeError,
  InvalidAddressError,
  TERM_ACTIONS,
  createTerm,
  parseAddress,
} from '@aclforge/policy-model';
import type {
  Address,
  AddressFamily,
  Filter,
  FilterHeader,
  FilterTarget,
  Policy,
  PortRange,
  Term,
  TermAction,
  ValidationError,
  ValidationResult,
  VerbatimEntry,
} from '@aclforge/policy-model';

/** Raised when a policy file cannot be read as a Policy. */
export class PolicyFormatError extends AclForgeError {
  constructor(
    readonly source: string,
    readonly errors: ReadonlyArray<ValidationError>,
  ) {
    super(
      `Invalid policy ${source}:\n` +
        errors.map((error) => `  ${error.context ?? '$'}: ${error.message}`).join('\n'),
    );
    this.name = 'PolicyFormatError';
  }
}

const TERM_FIELDS: ReadonlySet<string> = new Set([
  'name',
  'comment',
  'action',
  'protocol',
  'address',
  'sourceAddress',
  'sourceAddressExclude',
  'destinationAddress',
  'destinationAddressExclude',
  'sourcePort',
  'destinationPort',
  'option',
  'logging',
  'counter',
  'verbatim',
  'addressFamily',
]);

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTermAction(value: unknown): value is TermAction {
  return TERM_ACTIONS.some((action) => action === value);
}

function isOptionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

function isPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 65535;
}

// ---------------------------------------------------------------------------
// Document reader
// ---------------------------------------------------------------------------

/**
 * Walks one document, converting what it can and recording an error for
 * everything it cannot. The converted value is only meaningful when no
 * error was recorded.
 */
class DocumentReader {
  readonly errors: ValidationError[] = [];

  fail(path: string, message: string): void {
    this.errors.push({ message, context: path });
  }

  /** The elements of an optional array field; undefined reads as empty. */
  list(value: unknown, path: string): unknown[] {
    if (value === undefined) {
      return [];
    }
    if (!Array.isArray(value)) {
      this.fail(path, 'expected an array');
      return [];
    }
    const items: unknown[] = value;
    return items;
  }

  strings(value: unknown, path: string): string[] {
    const strings: string[] = [];
    this.list(value, path).forEach((item, index) => {
      if (typeof item === 'string') {
        strings.push(item);
      } else {
        this.fail(`${path}[${index}]`, 'expected a string');
      }
    });
    return strings;
  }

  policy(document: unknown): Policy {
    if (!isObject(document)) {
      this.fail('$', 'expected an object');
      return { filters: [] };
    }
    if (!Array.isArray(document['filters'])) {
      this.fail('filters', 'expected an array');
      return { filters: [] };
    }
    const filters = this.list(document['filters'], 'filters').map((filter, index) =>
      this.filter(filter, `filters[${index}]`),
    );
    if (filters.length === 0) {
      this.fail('filters', 'expected at least one filter');
    }
    return { filters };
  }

  private filter(value: unknown, path: string): Filter {
    if (!isObject(value)) {
      this.fail(path, 'expected an object');
      return { header: { targets: [], comment: [] }, terms: [] };
    }
    return {
      header: this.header(value['header'], `${path}.header`),
      terms: this.list(value['terms'], `${path}.terms`).map((term, index) =>
        this.term(term, `${path}.terms[${index}]`),
      ),
    };
  }

  private header(value: unknown, path: string): FilterHeader {
    if (!isObject(value)) {
      this.fail(path, 'expected an object');
      return { targets: [], comment: [] };
    }
    const targets: FilterTarget[] = [];
    this.list(value['targets'], `${path}.targets`).forEach((target, index) => {
      const targetPath = `${path}.targets[${index}]`;
      const platform = isObject(target) ? target['platform'] : undefined;
      if (!isObject(target) || typeof platform !== 'string') {
        this.fail(targetPath, 'expected an object with a string "platform"');
        return;
      }
      targets.push({ platform, options: this.strings(target['options'], `${targetPath}.options`) });
    });
    return { targets, comment: this.strings(value['comment'], `${path}.comment`) };
  }

  private term(value: unknown, path: string): Term {
    if (!isObject(value)) {
      this.fail(path, 'expected an object');
      return createTerm({ name: '', action: 'deny' });
    }
    for (const key of Object.keys(value)) {
      if (!TERM_FIELDS.has(key)) {
        this.fail(`${path}.${key}`, 'unknown term field');
      }
    }

    const name = value['name'];
    if (typeof name !== 'string' || name === '') {
      this.fail(`${path}.name`, 'expected a non-empty string');
    }
    const action = value['action'];
    if (!isTermAction(action)) {
      this.fail(`${path}.action`, `expected one of ${TERM_ACTIONS.join(', ')}`);
    }
    const logging = value['logging'];
    if (logging !== undefined && typeof logging !== 'boolean') {
      this.fail(`${path}.logging`, 'expected a boolean');
    }
    const counter = value['counter'];
    if (counter !== undefined && typeof counter !== 'string') {
      this.fail(`${path}.counter`, 'expected a string');
    }

    return createTerm({
      name: typeof name === 'string' ? name : '',
      action: isTermAction(action) ? action : 'deny',
      comment: this.strings(value['comment'], `${path}.comment`),
      protocol: this.protocols(value['protocol'], `${path}.protocol`),
      address: this.addresses(value['address'], `${path}.address`),
      sourceAddress: this.addresses(value['sourceAddress'], `${path}.sourceAddress`),
      sourceAddressExclude: this.addresses(value['sourceAddressExclude'], `${path}.sourceAddressExclude`),
      destinationAddress: this.addresses(value['destinationAddress'], `${path}.destinationAddress`),
      destinationAddressExclude: this.addresses(
        value['destinationAddressExclude'],
        `${path}.destinationAddressExclude`,
      ),
      sourcePort: this.ports(value['sourcePort'], `${path}.sourcePort`),
      destinationPort: this.ports(value['destinationPort'], `${path}.destinationPort`),
      option: this.strings(value['option'], `${path}.option`),
      logging: typeof logging === 'boolean' ? logging : false,
      counter: typeof counter === 'string' ? counter : undefined,
      verbatim: this.verbatim(value['verbatim'], `${path}.verbatim`),
      addressFamily: this.addressFamily(value['addressFamily'], `${path}.addressFamily`),
    });
  }

  private protocols(value: unknown, path: string): Array<string | number> {
    const protocols: Array<string | number> = [];
    this.list(value, path).forEach((item, index) => {
      if (typeof item === 'string' || typeof item === 'number') {
        protocols.push(item);
      } else {
        this.fail(`${path}[${index}]`, 'expected a protocol name or number');
      }
    });
    return protocols;
  }

  private addresses(value: unknown, path: string): Address[] {
    const addresses: Address[] = [];
    this.list(value, path).forEach((item, index) => {
      const address = this.address(item, `${path}[${index}]`);
      if (address !== undefined) {
        addresses.push(address);
      }
    });
    return addresses;
  }

  private address(value: unknown, path: string): Address | undefined {
    const entry: JsonObject = isObject(value) ? value : { address: value };
    const text = entry['address'];
    const token = entry['token'];
    const parentToken = entry['parentToken'];
    if (typeof text !== 'string') {
      this.fail(path, 'expected an address string or { address, token?, parentToken? }');
      return undefined;
    }
    if (!isOptionalString(token) || !isOptionalString(parentToken)) {
      this.fail(path, 'token and parentToken must be strings');
      return undefined;
    }
    try {
      return parseAddress(text, { token, parentToken });
    } catch (error) {
      if (error instanceof InvalidAddressError) {
        this.fail(path, error.message);
        return undefined;
      }
      throw error;
    }
  }

  private ports(value: unknown, path: string): PortRange[] {
    const ports: PortRange[] = [];
    this.list(value, path).forEach((item, index) => {
      const port = this.port(item);
      if (port === undefined) {
        this.fail(`${path}[${index}]`, 'expected a port, [low, high] or { low, high } within 0-65535');
      } else if (port.low > port.high) {
        this.fail(`${path}[${index}]`, `port range ${port.low}-${port.high} is inverted`);
      } else {
        ports.push(port);
      }
    });
    return ports;
  }

  private port(value: unknown): PortRange | undefined {
    if (isPort(value)) {
      return { low: value, high: value };
    }
    if (Array.isArray(value)) {
      const bounds: unknown[] = value;
      const [low, high] = bounds;
      return bounds.length === 2 && isPort(low) && isPort(high) ? { low, high } : undefined;
    }
    if (isObject(value)) {
      const { low, high } = value;
      return isPort(low) && isPort(high) ? { low, high } : undefined;
    }
    return undefined;
  }

  private verbatim(value: unknown, path: string): VerbatimEntry[] {
    const entries: VerbatimEntry[] = [];
    this.list(value, path).forEach((item, index) => {
      const platform = isObject(item) ? item['platform'] : undefined;
      const text = isObject(item) ? item['text'] : undefined;
      if (typeof platform === 'string' && typeof text === 'string') {
        entries.push({ platform, text });
      } else {
        this.fail(`${path}[${index}]`, 'expected { platform, text }');
      }
    });
    return entries;
  }

  private addressFamily(value: unknown, path: string): AddressFamily | undefined {
    if (value === undefined) {
      return undefined;
    }
    if (value === 4 || value === 6) {
      return value === 4 ? 4 : 6;
    }
    this.fail(path, 'expected 4 or 6');
    return undefined;
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Validate a parsed JSON document as a Policy.
 *
 * Filter names, subtypes and term semantics are left to the renderer; this
 * only checks that every value has the shape the model requires.
 */
export function validatePolicyDocument(document: unknown): ValidationResult<Policy> {
  const reader = new DocumentReader();
  const policy = reader.policy(document);
  if (reader.errors.length > 0) {
    return { ok: false, errors: reader.errors };
  }
  return { ok: true, value: policy };
}

/**
 * Parse policy JSON text.
 *
 * @param source - Name used in error messages, usually the file path
 * @throws {PolicyFormatError} on invalid JSON or an invalid document
 */
export function parsePolicy(text: string, source = '<input>'): Policy {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PolicyFormatError(source, [{ message: `not valid JSON: ${reason}` }]);
  }
  const result = validatePolicyDocument(document);
  if (!result.ok) {
    throw new PolicyFormatError(source, result.errors);
  }
  return result.value;
}

/**
 * Read and parse a policy file.
 *
 * @throws {PolicyFormatError} on invalid JSON or an invalid document
 */
export function loadPolicyFile(path: string): Policy {
  return parsePolicy(readFileSync(path, 'utf-8'), path);
}
