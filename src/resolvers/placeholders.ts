import type { PlaceholderType, ResolvedValue, ValueResolver } from '../types/index.js';

/**
 * Stand-in value for a resolver that cannot be resolved yet, such as a
 * reference to the output of a stack that has not been deployed.
 *
 * - explicit: `{ !stack_output(dev/vpc::VpcId) }`
 * - alphanum: the explicit form reduced to letters and digits, for values a
 *   provider validates strictly
 * - none: null
 */
export const createPlaceholder = ({
  resolver,
  placeholderType,
}: {
  resolver: ValueResolver;
  placeholderType: PlaceholderType;
}): ResolvedValue => {
  const explicit = `{ ${String(resolver)} }`;

  switch (placeholderType) {
    case 'explicit':
      return explicit;
    case 'alphanum':
      return explicit.replace(/[^A-Za-z0-9]/g, '');
    case 'none':
      return null;
  }
};
