/**
 * aclforge Renderer: Error Types
 *
 * Every error here is fatal to the render that raised it: the renderer
 * never returns a partial document.
 */

import { AclForgeError } from '@aclforge/policy-model';

/** No filter header in the policy targets the platform being rendered. */
export class NoPlatformPolicyError extends AclForgeError {
  constructor(platform: string) {
    super(`No ${platform} policy found: no filter header targets ${platform}`);
    this.name = 'NoPlatformPolicyError';
  }
}

/** A filter cannot be rendered as a Cisco access list. */
export class UnsupportedAccessListError extends AclForgeError {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedAccessListError';
  }
}

/** The filter subtype option names an access-list form this renderer lacks. */
export class UnsupportedFilterTypeError extends UnsupportedAccessListError {
  constructor(
    readonly filterType: string,
    supported: ReadonlyArray<string>,
  ) {
    super(
      `Unsupported access list type ${JSON.stringify(filterType)}; ` +
        `only access list types ${supported.join(', ')} are supported`,
    );
    this.name = 'UnsupportedFilterTypeError';
  }
}

/** The filter name violates the numbering rule of its access-list form. */
export class InvalidFilterNameError extends UnsupportedAccessListError {
  constructor(
    readonly filterName: string,
    reason: string,
  ) {
    super(`Invalid access list name ${JSON.stringify(filterName)}: ${reason}`);
    this.name = 'InvalidFilterNameError';
  }
}

/** A term handed to the standard-ACL renderer uses a field standard ACLs lack. */
export class StandardAclTermError extends AclForgeError {
  constructor(
    readonly termName: string,
    reason: string,
  ) {
    super(`Term ${JSON.stringify(termName)}: ${reason}`);
    this.name = 'StandardAclTermError';
  }
}

/** Raised for an unknown protocol name when strict protocol resolution is on. */
export class UnknownProtocolError extends AclForgeError {
  constructor(readonly protocol: string) {
    super(`Unknown protocol ${JSON.stringify(protocol)}`);
    this.name = 'UnknownProtocolError';
  }
}

export class InvalidRenderOptionsError extends AclForgeError {
  constructor(reason: string) {
    super(`Invalid render options: ${reason}`);
    this.name = 'InvalidRenderOptionsError';
  }
}
