import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { isInitialized, loadSettings, saveSettings, SETTINGS_FILE } from '../../storage/config.js';
import type { GlobalOptions } from '../options.js';

interface InitOptions {
  projectCode?: string;
  region?: string;
  yes?: boolean;
}

const EXAMPLE_TEMPLATE = `Description: Example stack
Parameters:
  Environment:
    Type: String
Resources:
  Placeholder:
    Type: Local::Null
Outputs:
  Name:
    Value: \${AWS::StackName}-\${Environment}
`;

const EXAMPLE_STACK = `template: example.yaml
parameters:
  Environment: dev
`;

const writeIfMissing = async (filePath: string, content: string): Promise<void> => {
  try {
    await writeFile(filePath, content, { flag: 'wx' });
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) throw error;
  }
};

const promptForMissing = async (options: InitOptions): Promise<{ projectCode: string; region?: string }> => {
  if (options.yes || (options.projectCode && options.region)) {
    return { projectCode: options.projectCode ?? 'project', region: options.region };
  }

  const answers = await inquirer.prompt<{ projectCode: string; region: string }>([
    {
      type: 'input',
      name: 'projectCode',
      message: 'Project code (prefix of stack names):',
      default: options.projectCode ?? 'project',
      when: options.projectCode === undefined,
    },
    {
      type: 'input',
      name: 'region',
      message: 'Default region (leave empty for none):',
      when: options.region === undefined,
    },
  ]);

  return {
    projectCode: options.projectCode ?? answers.projectCode,
    region: options.region ?? (answers.region || undefined),
  };
};

/**
 * Create stackpilot.json, the config and templates directories and an
 * example stack
 */
export const initCommand = async ({
  options,
  global,
}: {
  options: InitOptions;
  global: GlobalOptions;
}): Promise<boolean> => {
  const { projectDir } = global;

  if (await isInitialized({ projectDir })) {
    console.log(chalk.yellow('Project is already initialized.'));
    console.log(`Settings: ${chalk.cyan(join(projectDir, SETTINGS_FILE))}`);
    return true;
  }

  const { projectCode, region } = await promptForMissing(options);
  await saveSettings({ projectDir, settings: { projectCode, region } });
  const settings = await loadSettings({ projectDir });

  await mkdir(settings.configDir, { recursive: true });
  await mkdir(settings.templatesDir, { recursive: true });
  await writeIfMissing(join(settings.templatesDir, 'example.yaml'), EXAMPLE_TEMPLATE);
  await writeIfMissing(join(settings.configDir, 'example.yaml'), EXAMPLE_STACK);

  console.log(chalk.green('✓ Project initialized.'));
  console.log();
  console.log(`Settings: ${chalk.cyan(join(settings.projectDir, SETTINGS_FILE))}`);
  console.log(`Stack configs: ${chalk.cyan(settings.configDir)}`);
  console.log(`Templates: ${chalk.cyan(settings.templatesDir)}`);
  console.log();
  console.log('Next steps:');
  console.log(`  ${chalk.cyan('stackpilot list')} - Show stacks and their dependencies`);
  console.log(`  ${chalk.cyan('stackpilot launch')} - Create or update every stack`);
  return true;
};
