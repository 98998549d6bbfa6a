import { mkdir, readFile, writeFile, access } from 'fs/promises';
import { join, resolve } from 'path';
import { z } from 'zod';
import { InvalidConfigError } from '../core/errors.js';

export const SETTINGS_FILE = 'stackpilot.json';

const settingsSchema = z
  .object({
    projectCode: z.string().min(1).optional(),
    region: z.string().min(1).optional(),
    profile: z.string().min(1).optional(),
    configDirectory: z.string().min(1).default('config'),
    templatesDirectory: z.string().min(1).default('templates'),
    stateDirectory: z.string().min(1).default('.stackpilot/state'),
    maxConcurrency: z.number().int().positive().optional(),
    pollIntervalMs: z.number().int().nonnegative().default(4000),
    plugins: z.array(z.string().min(1)).default([]),
  })
  .strict();

export type Settings = z.infer<typeof settingsSchema>;
export type SettingsInput = z.input<typeof settingsSchema>;

/** Settings plus absolute directory paths derived from the project root. */
export interface ProjectSettings extends Settings {
  projectDir: string;
  configDir: string;
  templatesDir: string;
  stateDir: string;
}

export const parseSettings = ({
  input,
  source = SETTINGS_FILE,
}: {
  input: unknown;
  source?: string;
}): Settings => {
  const parsed = settingsSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigError(`Invalid settings in ${source}: ${details}`);
  }
  return parsed.data;
};

const withPaths = (projectDir: string, settings: Settings): ProjectSettings => ({
  ...settings,
  projectDir,
  configDir: resolve(projectDir, settings.configDirectory),
  templatesDir: resolve(projectDir, settings.templatesDirectory),
  stateDir: resolve(projectDir, settings.stateDirectory),
});

/**
 * Check if a directory holds a settings file
 */
export const isInitialized = async ({ projectDir }: { projectDir: string }): Promise<boolean> => {
  try {
    await access(join(projectDir, SETTINGS_FILE));
    return true;
  } catch {
    return false;
  }
};

/**
 * Load the settings file, falling back to defaults when there is none
 */
export const loadSettings = async ({
  projectDir,
}: {
  projectDir: string;
}): Promise<ProjectSettings> => {
  const root = resolve(projectDir);
  const filePath = join(root, SETTINGS_FILE);

  let content: string | null = null;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error;
  }

  if (content === null) {
    return withPaths(root, parseSettings({ input: {} }));
  }

  let input: unknown;
  try {
    input = JSON.parse(content);
  } catch (error) {
    throw new InvalidConfigError(`${SETTINGS_FILE} is not valid JSON.`, { cause: error });
  }
  return withPaths(root, parseSettings({ input }));
};

/**
 * Save the settings file
 */
export const saveSettings = async ({
  projectDir,
  settings,
}: {
  projectDir: string;
  settings: SettingsInput;
}): Promise<void> => {
  await mkdir(projectDir, { recursive: true });
  await writeFile(join(projectDir, SETTINGS_FILE), `${JSON.stringify(settings, null, 2)}\n`);
};
