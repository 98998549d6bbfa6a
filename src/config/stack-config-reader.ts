import { readdir, readFile } from 'fs/promises';
import { extname, join, relative, sep } from 'path';
import { DEFAULT_SCHEMA, Type, load as parseYaml, type Schema } from 'js-yaml';
import { z } from 'zod';
import {
  OPERATIONS,
  isOperation,
  type ActionHook,
  type ConfigValue,
  type Stack,
  type StackConfigInput,
} from '../types/index.js';
import { errorMessageOf, InvalidConfigError, StackpilotError, UnknownResolverError } from '../core/errors.js';
import type { Registries } from '../core/registry.js';
import { createStack } from '../core/stack.js';
import { hookPointFor, isActionHook } from '../hooks/index.js';
import { isValueResolver } from '../resolvers/index.js';
import type { ProjectSettings } from '../storage/config.js';

const YAML_KINDS = ['scalar', 'sequence', 'mapping'] as const;

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' &&
  value !== null &&
  !Array.isArray(value) &&
  Object.getPrototypeOf(value) === Object.prototype;

/**
 * Turn a value constructed by the YAML loader into a config value. Timestamps
 * become ISO strings; anything else that is not plain data is rejected.
 */
export const toConfigValue = (value: unknown, path = ''): ConfigValue => {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (value === undefined) return null;
  if (isValueResolver(value)) return value;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) {
    return value.map((item, index) => toConfigValue(item, `${path}[${index}]`));
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, toConfigValue(item, path ? `${path}.${key}` : key)])
    );
  }
  throw new InvalidConfigError(`Unsupported value at '${path || '(root)'}'.`);
};

/**
 * YAML schema in which every registered resolver and hook tag constructs its
 * instance. Tags nobody registered are an error.
 */
export const createConfigSchema = (registries: Registries): Schema => {
  const tagged = (tag: string, create: (argument: ConfigValue) => unknown) =>
    YAML_KINDS.map(
      (kind) =>
        new Type(`!${tag}`, {
          kind,
          construct: (data: unknown) => create(toConfigValue(data)),
        })
    );

  const unknownTag = YAML_KINDS.map(
    (kind) =>
      new Type('!', {
        kind,
        multi: true,
        construct: (_data: unknown, tag?: string) => {
          throw new UnknownResolverError((tag ?? '!').slice(1));
        },
      })
  );

  return DEFAULT_SCHEMA.extend([
    ...registries.resolvers
      .tags()
      .flatMap((tag) => tagged(tag, (argument) => registries.resolvers.create(tag, argument))),
    ...registries.hooks
      .tags()
      .flatMap((tag) => tagged(tag, (argument) => registries.hooks.create(tag, argument))),
    ...unknownTag,
  ]);
};

const HOOK_POINTS = new Set(
  Object.keys(OPERATIONS)
    .filter(isOperation)
    .flatMap((operation) =>
      (['before', 'after'] as const).map((position) => hookPointFor(position, operation))
    )
);

const configValueSchema = z.custom<ConfigValue>(
  (value) => {
    try {
      toConfigValue(value);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Expected plain data or a resolver' }
);

const hookSchema = z.custom<ActionHook>(isActionHook, {
  message: 'Expected a hook such as !cmd',
});

const stackFileSchema = z
  .object({
    template: z.string().min(1).optional(),
    stack_name: z.string().min(1).optional(),
    region: z.string().min(1).optional(),
    profile: z.string().min(1).optional(),
    parameters: z.record(configValueSchema).optional(),
    user_data: z.record(configValueSchema).optional(),
    tags: z.record(configValueSchema).optional(),
    dependencies: z.array(z.string().min(1)).optional(),
    hooks: z
      .record(
        z.string().refine((point) => HOOK_POINTS.has(point), {
          message: 'Unknown hook point',
        }),
        z.array(hookSchema)
      )
      .optional(),
    protect: z.boolean().optional(),
    ignore: z.boolean().optional(),
    obsolete: z.boolean().optional(),
    timeout: z.number().int().positive().optional(),
    disable_rollback: z.boolean().optional(),
    on_failure: z.enum(['DO_NOTHING', 'ROLLBACK', 'DELETE']).optional(),
  })
  .strict();

type StackFile = z.infer<typeof stackFileSchema>;

const recordOf = (
  values: Record<string, ConfigValue> | undefined
): Record<string, ConfigValue> | undefined =>
  values === undefined
    ? undefined
    : Object.fromEntries(Object.entries(values).map(([key, value]) => [key, toConfigValue(value)]));

const toStackConfig = (
  file: StackFile,
  defaults: { region?: string; profile?: string }
): StackConfigInput => ({
  template: file.template,
  stackName: file.stack_name,
  region: file.region ?? defaults.region,
  profile: file.profile ?? defaults.profile,
  parameters: recordOf(file.parameters),
  userData: recordOf(file.user_data),
  tags: recordOf(file.tags),
  dependencies: file.dependencies,
  hooks: file.hooks,
  protect: file.protect,
  ignore: file.ignore,
  obsolete: file.obsolete,
  timeoutMinutes: file.timeout,
  disableRollback: file.disable_rollback,
  onFailure: file.on_failure,
});

/**
 * Parse one stack file into its config. The identity is only used in error
 * messages.
 */
export const parseStackConfig = ({
  stackId,
  content,
  schema,
  defaults = {},
}: {
  stackId: string;
  content: string;
  schema: Schema;
  defaults?: { region?: string; profile?: string };
}): StackConfigInput => {
  let document: unknown;
  try {
    document = parseYaml(content, { schema, filename: stackId });
  } catch (error) {
    if (error instanceof StackpilotError) throw error;
    throw new InvalidConfigError(`Stack '${stackId}': ${errorMessageOf(error)}`, { cause: error });
  }

  const parsed = stackFileSchema.safeParse(document ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigError(`Stack '${stackId}': ${details}`);
  }

  return toStackConfig(parsed.data, defaults);
};

const STACK_FILE_EXTENSIONS = new Set(['.yaml', '.yml']);

const listStackFiles = async (dir: string): Promise<string[]> => {
  const entries = await readdir(dir, { withFileTypes: true });
  const nested = await Promise.all(
    entries.map(async (entry) => {
      const entryPath = join(dir, entry.name);
      if (entry.isDirectory()) return listStackFiles(entryPath);
      return entry.isFile() && STACK_FILE_EXTENSIONS.has(extname(entry.name)) ? [entryPath] : [];
    })
  );
  return nested.flat();
};

/**
 * Read every stack file under the config directory. `dev/vpc.yaml` becomes
 * the stack `dev/vpc`.
 */
export const readStacks = async ({
  settings,
  registries,
}: {
  settings: Pick<ProjectSettings, 'configDir' | 'projectCode' | 'region' | 'profile'>;
  registries: Registries;
}): Promise<Stack[]> => {
  let files: string[];
  try {
    files = await listStackFiles(settings.configDir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new InvalidConfigError(`Config directory ${settings.configDir} does not exist.`, {
        cause: error,
      });
    }
    throw error;
  }

  const schema = createConfigSchema(registries);
  const stacks = await Promise.all(
    files.sort().map(async (filePath) => {
      const stackId = relative(settings.configDir, filePath)
        .split(sep)
        .join('/')
        .replace(/\.ya?ml$/, '');
      const content = await readFile(filePath, 'utf-8');
      const config = parseStackConfig({
        stackId,
        content,
        schema,
        defaults: { region: settings.region, profile: settings.profile },
      });
      return createStack({ stackId, config, projectCode: settings.projectCode });
    })
  );

  return stacks;
};
