import { readFile } from 'fs/promises';
import { isAbsolute, resolve } from 'path';
import type { ResolvedValue, Stack } from '../types/index.js';
import { InvalidConfigError } from '../core/errors.js';

export interface TemplateCompileInput {
  stack: Stack;
  /** The stack's user data, materialised. */
  userData: Record<string, ResolvedValue>;
}

export interface TemplateCompiler {
  compile(input: TemplateCompileInput): Promise<string>;
}

/**
 * Read a stack's template file from the templates directory as is
 */
export const createFileTemplateCompiler = ({
  templatesDir,
}: {
  templatesDir: string;
}): TemplateCompiler => ({
  compile: async ({ stack }) => {
    const { template } = stack.config;
    if (template === undefined || template === '') {
      throw new InvalidConfigError(`Stack '${stack.stackId}' does not name a template.`);
    }

    const filePath = isAbsolute(template) ? template : resolve(templatesDir, template);
    try {
      return await readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new InvalidConfigError(
          `Template '${template}' of stack '${stack.stackId}' was not found at ${filePath}.`,
          { cause: error }
        );
      }
      throw error;
    }
  },
});
