import type { ResolutionContext, ResolverFactory, ValueResolver } from '../types/index.js';
import {
  InvalidConfigError,
  InvalidResolverArgumentError,
  MissingStackOutputError,
  ResolutionError,
  StackDoesNotExistError,
} from '../core/errors.js';
import { normalizeStackId } from '../core/stack-id.js';
import { createPlaceholder } from './placeholders.js';
import { defineResolver } from './resolver.js';

interface OutputReference {
  stackRef: string;
  outputName: string;
}

const parseReference = (argument: unknown): OutputReference | null => {
  const parts = typeof argument === 'string' ? argument.trim().split('::') : [];
  if (parts.length !== 2 || parts[0] === '' || parts[1] === '') {
    return null;
  }
  return { stackRef: parts[0], outputName: parts[1] };
};

const invalidReferenceMessage = (tag: string, argument: unknown): string =>
  `!${tag} requires an argument of the form '<stack>::<output name>', got ${JSON.stringify(argument)}.`;

const pickOutput = async ({
  resolver,
  context,
  stackName,
  outputName,
  fetchOutputs,
}: {
  resolver: ValueResolver;
  context: ResolutionContext;
  stackName: string;
  outputName: string;
  fetchOutputs: () => Promise<Record<string, string>>;
}): Promise<string | null> => {
  let outputs: Record<string, string>;
  try {
    outputs = await fetchOutputs();
  } catch (error) {
    if (error instanceof StackDoesNotExistError && context.placeholders) {
      const placeholder = createPlaceholder({
        resolver,
        placeholderType: context.placeholderType,
      });
      return typeof placeholder === 'string' ? placeholder : null;
    }
    throw error;
  }

  const value = outputs[outputName];
  if (value === undefined) {
    throw new MissingStackOutputError(stackName, outputName);
  }
  return value;
};

/**
 * `!stack_output dev/vpc::VpcId` - output of another stack in the project.
 * The referenced stack becomes a dependency of the owning stack.
 */
export const stackOutput: ResolverFactory = (argument) => {
  let reference: OutputReference | null = null;

  const resolver: ValueResolver = defineResolver({
    tag: 'stack_output',
    argument,
    setup: (state) => {
      const parsed = parseReference(state.argument);
      if (!parsed) {
        throw new InvalidConfigError(invalidReferenceMessage(state.tag, state.argument));
      }
      reference = { ...parsed, stackRef: normalizeStackId(parsed.stackRef) };
      state.dependencies.add(reference.stackRef);
    },
    resolve: async ({ context }) => {
      if (!reference) {
        throw new ResolutionError('!stack_output was resolved before being bound to a stack.');
      }
      const { stackRef, outputName } = reference;

      const target = context.lookupStack(stackRef);
      if (!target) {
        throw new InvalidResolverArgumentError(
          `!stack_output references '${stackRef}', which is not a stack in the project.`
        );
      }

      return pickOutput({
        resolver,
        context,
        stackName: target.externalName,
        outputName,
        fetchOutputs: () => context.getStackOutputs(target),
      });
    },
  });

  return resolver;
};

/**
 * `!stack_output_external other-stack::Output [region [profile]]` - output of
 * any stack the provider knows, by its provider-side name. Adds no dependency.
 */
export const stackOutputExternal: ResolverFactory = (argument) => {
  const resolver: ValueResolver = defineResolver({
    tag: 'stack_output_external',
    argument,
    resolve: async ({ context, resolveArgument }) => {
      const resolved = await resolveArgument();
      const [referenceText = '', region, profile] =
        typeof resolved === 'string' ? resolved.trim().split(/\s+/) : [];
      const parsed = parseReference(referenceText);
      if (!parsed) {
        throw new InvalidResolverArgumentError(
          invalidReferenceMessage('stack_output_external', resolved)
        );
      }
      const { stackRef, outputName } = parsed;

      return pickOutput({
        resolver,
        context,
        stackName: stackRef,
        outputName,
        fetchOutputs: () =>
          context.getExternalStackOutputs({
            stackName: stackRef,
            region: region ?? context.stack.region,
            profile: profile ?? context.stack.profile,
          }),
      });
    },
  });

  return resolver;
};
