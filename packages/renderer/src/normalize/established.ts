/**
 * aclforge Renderer: Established-Connection Preprocessing
 *
 * Cisco ACLs are stateless. A term marked `established` therefore also
 * admits return traffic to the unprivileged port range, for every protocol;
 * for TCP the renderer additionally emits the `established` keyword.
 */

import type { Policy, PortRange, Term } from '@aclforge/policy-model';

export const HIGH_PORTS: PortRange = { low: 1024, high: 65535 };

export function hasEstablishedOption(term: Term): boolean {
  return term.option.some((option) => option.startsWith('established'));
}

function withHighPorts(term: Term): Term {
  if (!hasEstablishedOption(term)) {
    return term;
  }
  return { ...term, destinationPort: [...term.destinationPort, HIGH_PORTS] };
}

/**
 * Return a policy in which every `established` term has the destination
 * range 1024-65535 appended. The input policy is not modified.
 */
export function applyEstablishedHighPorts(policy: Policy): Policy {
  return {
    ...policy,
    filters: policy.filters.map((filter) => ({ ...filter, terms: filter.terms.map(withHighPorts) })),
  };
}
