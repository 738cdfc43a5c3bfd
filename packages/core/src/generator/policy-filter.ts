import { InvalidPolicyRequirementError } from '../types/errors.js';
import { OrderedSet } from '../util/ordered-set.js';

export type PolicyRequirement =
  | 'requires-uppercase'
  | 'requires-digit'
  | 'requires-special';

const POLICY_CHECKS: Readonly<Record<PolicyRequirement, RegExp>> = {
  'requires-uppercase': /[A-Z]/,
  'requires-digit': /[0-9]/,
  'requires-special': /[^A-Za-z0-9]/,
};

const POLICY_ALIASES: Readonly<Record<string, PolicyRequirement>> = {
  uppercase: 'requires-uppercase',
  number: 'requires-digit',
  digit: 'requires-digit',
  special: 'requires-special',
  'requires-uppercase': 'requires-uppercase',
  'requires-digit': 'requires-digit',
  'requires-special': 'requires-special',
};

export function isPolicyRequirement(name: string): name is PolicyRequirement {
  return Object.hasOwn(POLICY_CHECKS, name);
}

/**
 * AND of every requested check. Names that are not a known requirement
 * are skipped, so an empty or all-unknown list accepts everything.
 */
export function satisfies(
  password: string,
  requirements: Iterable<string>
): boolean {
  for (const requirement of requirements) {
    if (!isPolicyRequirement(requirement)) continue;
    if (!POLICY_CHECKS[requirement].test(password)) return false;
  }
  return true;
}

export interface ParsedPolicy {
  requirements: PolicyRequirement[];
  warnings: InvalidPolicyRequirementError[];
}

/**
 * Map config names (`uppercase`, `number`, `special`) to requirements.
 * Unknown names are reported as warnings and otherwise ignored.
 */
export function parsePolicyRequirements(
  names: readonly string[]
): ParsedPolicy {
  const requirements = new OrderedSet<PolicyRequirement>();
  const warnings: InvalidPolicyRequirementError[] = [];
  for (const name of names) {
    const requirement = Object.hasOwn(POLICY_ALIASES, name)
      ? POLICY_ALIASES[name]
      : undefined;
    if (requirement) {
      requirements.add(requirement);
    } else {
      warnings.push(new InvalidPolicyRequirementError(name));
    }
  }
  return { requirements: requirements.toArray(), warnings };
}
