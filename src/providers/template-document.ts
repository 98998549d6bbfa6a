import { DEFAULT_SCHEMA, Type, load as parseYaml } from 'js-yaml';
import { z } from 'zod';
import { ProviderError } from '../core/errors.js';

/**
 * Intrinsic function tags (`!Ref`, `!Sub`, `!GetAtt`...) become their long
 * form: `!Ref X` is `{ Ref: X }`, any other `!Name x` is `{ 'Fn::Name': x }`.
 */
const intrinsicTypes = (['scalar', 'sequence', 'mapping'] as const).map(
  (kind) =>
    new Type('!', {
      kind,
      multi: true,
      construct: (data: unknown, tag?: string) => {
        const name = (tag ?? '!').slice(1);
        return { [name === 'Ref' ? 'Ref' : `Fn::${name}`]: data };
      },
    })
);

const TEMPLATE_SCHEMA = DEFAULT_SCHEMA.extend(intrinsicTypes);

const parameterSchema = z
  .object({
    Type: z.string().optional(),
    Default: z.unknown().optional(),
    Description: z.string().optional(),
  })
  .passthrough();

const outputSchema = z
  .object({
    Value: z.unknown(),
    Description: z.string().optional(),
  })
  .passthrough();

const templateSchema = z
  .object({
    Description: z.string().optional(),
    Parameters: z.record(parameterSchema).optional(),
    Resources: z.record(z.unknown()),
    Outputs: z.record(outputSchema).optional(),
  })
  .passthrough();

export type TemplateDocument = z.infer<typeof templateSchema>;

export const parseTemplate = (templateBody: string): TemplateDocument => {
  let document: unknown;
  try {
    document = parseYaml(templateBody, { schema: TEMPLATE_SCHEMA });
  } catch (error) {
    throw new ProviderError(
      'ValidationError',
      `Template format error: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = templateSchema.safeParse(document);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ProviderError(
      'ValidationError',
      `Template format error: ${issue.path.join('.') || 'template'}: ${issue.message}`
    );
  }
  return parsed.data;
};

export const parameterDefaults = (template: TemplateDocument): Record<string, string> => {
  const defaults: Record<string, string> = {};
  Object.entries(template.Parameters ?? {}).forEach(([name, declaration]) => {
    if (declaration.Default !== undefined) defaults[name] = String(declaration.Default);
  });
  return defaults;
};

/**
 * Parameter values for a deployment: template defaults overlaid with the
 * supplied values. A parameter with neither is an error.
 */
export const effectiveParameters = ({
  template,
  parameters,
}: {
  template: TemplateDocument;
  parameters: Record<string, string>;
}): Record<string, string> => {
  const declared = template.Parameters ?? {};
  const missing: string[] = [];
  const values: Record<string, string> = {};

  Object.entries(declared).forEach(([name, declaration]) => {
    const supplied = parameters[name];
    if (supplied !== undefined) {
      values[name] = supplied;
    } else if (declaration.Default !== undefined) {
      values[name] = String(declaration.Default);
    } else {
      missing.push(name);
    }
  });

  if (missing.length > 0) {
    throw new ProviderError('ValidationError', `Parameters: [${missing.join(', ')}] must have values`);
  }

  const undeclared = Object.keys(parameters).filter((name) => !(name in declared));
  if (undeclared.length > 0) {
    throw new ProviderError(
      'ValidationError',
      `Parameters: [${undeclared.join(', ')}] do not exist in the template`
    );
  }

  return values;
};

const substitute = (text: string, variables: Record<string, string>): string =>
  text.replace(/\$\{([A-Za-z0-9_.:]+)\}/g, (match, name: string) => variables[name] ?? match);

const evaluate = (value: unknown, variables: Record<string, string>): string => {
  if (typeof value === 'string') return substitute(value, variables);
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);

  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    const entries = Object.entries(value);
    if (entries.length === 1) {
      const [[fn, argument]] = entries;
      if (fn === 'Ref' && typeof argument === 'string') {
        return variables[argument] ?? argument;
      }
      if (fn === 'Fn::Sub' && typeof argument === 'string') {
        return substitute(argument, variables);
      }
      if (fn === 'Fn::Join' && Array.isArray(argument) && argument.length === 2) {
        const [delimiter, items] = argument;
        if (typeof delimiter === 'string' && Array.isArray(items)) {
          return items.map((item) => evaluate(item, variables)).join(delimiter);
        }
      }
    }
  }

  return JSON.stringify(value);
};

/**
 * Compute output values. `${Name}` and `!Ref Name` read parameters, or the
 * physical id of a resource, which is `<stackName>-<LogicalId>`.
 */
export const evaluateOutputs = ({
  template,
  stackName,
  parameters,
}: {
  template: TemplateDocument;
  stackName: string;
  parameters: Record<string, string>;
}): Record<string, string> => {
  const variables: Record<string, string> = { 'AWS::StackName': stackName };
  Object.keys(template.Resources).forEach((logicalId) => {
    variables[logicalId] = `${stackName}-${logicalId}`;
  });
  Object.assign(variables, parameters);

  const outputs: Record<string, string> = {};
  Object.entries(template.Outputs ?? {}).forEach(([name, output]) => {
    outputs[name] = evaluate(output.Value, variables);
  });
  return outputs;
};
