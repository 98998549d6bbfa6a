import { posix } from 'path';

/**
 * Normalise a stack id written in config: forward slashes, no leading
 * `./` or `/`, no `.yaml`/`.yml` suffix
 */
export const normalizeStackId = (stackId: string): string =>
  posix
    .normalize(stackId.trim().replace(/\\/g, '/'))
    .replace(/^(\.\/)+/, '')
    .replace(/^\/+/, '')
    .replace(/\.ya?ml$/, '');

/**
 * Provider-side name: the id with slashes turned to dashes, prefixed with
 * the project code when one is set
 */
export const defaultExternalName = ({
  stackId,
  projectCode,
}: {
  stackId: string;
  projectCode?: string;
}): string => {
  const base = stackId.replace(/\//g, '-');
  return projectCode ? `${projectCode}-${base}` : base;
};
