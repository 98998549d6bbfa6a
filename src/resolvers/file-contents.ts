import { readFile } from 'fs/promises';
import { resolve as resolvePath } from 'path';
import type { ResolverFactory } from '../types/index.js';
import { FileContentsError, InvalidResolverArgumentError } from '../core/errors.js';
import { defineResolver } from './resolver.js';

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * `!file_contents path/to/file` - text of a file, relative paths taken from
 * the project directory
 */
export const fileContents: ResolverFactory = (argument) =>
  defineResolver({
    tag: 'file_contents',
    argument,
    resolve: async ({ context, resolveArgument }) => {
      const path = await resolveArgument();
      if (typeof path !== 'string' || path === '') {
        throw new InvalidResolverArgumentError('!file_contents requires a file path.');
      }

      const absolutePath = resolvePath(context.projectDir, path);
      try {
        return await readFile(absolutePath, 'utf-8');
      } catch (error) {
        if (isMissingFile(error)) {
          throw new FileContentsError(`File '${path}' does not exist.`, { cause: error });
        }
        throw new FileContentsError(`Could not read file '${path}'.`, { cause: error });
      }
    },
  });
