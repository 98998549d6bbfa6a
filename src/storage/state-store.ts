import { mkdir, readFile, writeFile, readdir, unlink } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';

const deployedStackSchema = z.object({
  stackName: z.string(),
  status: z.string(),
  statusReason: z.string().optional(),
  templateBody: z.string(),
  parameters: z.record(z.string()),
  tags: z.record(z.string()),
  outputs: z.record(z.string()),
  createdAt: z.string(),
  updatedAt: z.string().nullable(),
});

export type DeployedStackRecord = z.infer<typeof deployedStackSchema>;

/**
 * Persistence behind the local provider: one record per deployed stack
 */
export interface StateStore {
  load(input: { stackName: string }): Promise<DeployedStackRecord | null>;
  save(input: { record: DeployedStackRecord }): Promise<void>;
  remove(input: { stackName: string }): Promise<boolean>;
  list(): Promise<DeployedStackRecord[]>;
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const fileNameFor = (stackName: string): string => `${encodeURIComponent(stackName)}.json`;

/**
 * Store records as JSON files in a directory
 */
export const createFileStateStore = ({ stateDir }: { stateDir: string }): StateStore => {
  const readRecord = async (filePath: string): Promise<DeployedStackRecord | null> => {
    try {
      const content = await readFile(filePath, 'utf-8');
      return deployedStackSchema.parse(JSON.parse(content));
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  };

  return {
    load: ({ stackName }) => readRecord(join(stateDir, fileNameFor(stackName))),

    save: async ({ record }) => {
      await mkdir(stateDir, { recursive: true });
      const filePath = join(stateDir, fileNameFor(record.stackName));
      await writeFile(filePath, JSON.stringify(record, null, 2));
    },

    remove: async ({ stackName }) => {
      try {
        await unlink(join(stateDir, fileNameFor(stackName)));
        return true;
      } catch (error) {
        if (isMissingFile(error)) return false;
        throw error;
      }
    },

    list: async () => {
      let files: string[];
      try {
        files = await readdir(stateDir);
      } catch (error) {
        if (isMissingFile(error)) return [];
        throw error;
      }

      const records = await Promise.all(
        files
          .filter((file) => file.endsWith('.json'))
          .map((file) => readRecord(join(stateDir, file)))
      );
      return records.filter((record): record is DeployedStackRecord => record !== null);
    },
  };
};

/**
 * In-process store, used by tests
 */
export const createMemoryStateStore = (): StateStore => {
  const records = new Map<string, DeployedStackRecord>();

  return {
    load: async ({ stackName }) => {
      const record = records.get(stackName);
      return record ? structuredClone(record) : null;
    },
    save: async ({ record }) => {
      records.set(record.stackName, structuredClone(record));
    },
    remove: async ({ stackName }) => records.delete(stackName),
    list: async () => [...records.values()].map((record) => structuredClone(record)),
  };
};
