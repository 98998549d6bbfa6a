import { isDeepStrictEqual } from 'util';

export type ChangeKind = 'added' | 'removed' | 'modified';

export interface TemplateChange {
  /** Section, or section and entry such as `Resources.Queue`. */
  path: string;
  change: ChangeKind;
}

export interface ValueChange {
  key: string;
  change: ChangeKind;
  deployed: string | null;
  generated: string | null;
}

/** What a stack looks like on one side of a diff. */
export interface StackSnapshot {
  template: Record<string, unknown>;
  parameters: Record<string, string>;
  tags: Record<string, string>;
}

export interface StackDiff {
  stackName: string;
  /** False when nothing is deployed; everything generated then counts as added. */
  deployed: boolean;
  template: TemplateChange[];
  parameters: ValueChange[];
  tags: ValueChange[];
  hasChanges: boolean;
}

const EMPTY_SNAPSHOT: StackSnapshot = { template: {}, parameters: {}, tags: {} };

const changeOf = (deployed: unknown, generated: unknown): ChangeKind | null => {
  if (deployed === undefined && generated === undefined) return null;
  if (deployed === undefined) return 'added';
  if (generated === undefined) return 'removed';
  return isDeepStrictEqual(deployed, generated) ? null : 'modified';
};

const keysOf = (...records: Array<Record<string, unknown>>): string[] =>
  [...new Set(records.flatMap((record) => Object.keys(record)))].sort();

// a missing section compares as an empty one
const sectionOf = (value: unknown): Record<string, unknown> | null => {
  if (value === undefined) return {};
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : null;
};

/**
 * Compare two parsed templates section by section. Mapping sections such as
 * Resources are compared entry by entry; anything else as a whole.
 */
export const compareTemplates = ({
  deployed,
  generated,
}: {
  deployed: Record<string, unknown>;
  generated: Record<string, unknown>;
}): TemplateChange[] =>
  keysOf(deployed, generated).flatMap((section) => {
    const deployedSection = sectionOf(deployed[section]);
    const generatedSection = sectionOf(generated[section]);

    if (deployedSection && generatedSection) {
      return keysOf(deployedSection, generatedSection).flatMap((entry) => {
        const change = changeOf(deployedSection[entry], generatedSection[entry]);
        return change ? [{ path: `${section}.${entry}`, change }] : [];
      });
    }

    const change = changeOf(deployed[section], generated[section]);
    return change ? [{ path: section, change }] : [];
  });

export const compareValues = ({
  deployed,
  generated,
}: {
  deployed: Record<string, string>;
  generated: Record<string, string>;
}): ValueChange[] =>
  keysOf(deployed, generated).flatMap((key) => {
    const change = changeOf(deployed[key], generated[key]);
    return change
      ? [{ key, change, deployed: deployed[key] ?? null, generated: generated[key] ?? null }]
      : [];
  });

/**
 * Difference between the stack as it would be deployed now and as it is
 * deployed, or null when it is not deployed at all
 */
export const diffStack = ({
  stackName,
  generated,
  deployed,
}: {
  stackName: string;
  generated: StackSnapshot;
  deployed: StackSnapshot | null;
}): StackDiff => {
  const current = deployed ?? EMPTY_SNAPSHOT;
  const template = compareTemplates({ deployed: current.template, generated: generated.template });
  const parameters = compareValues({
    deployed: current.parameters,
    generated: generated.parameters,
  });
  const tags = compareValues({ deployed: current.tags, generated: generated.tags });

  return {
    stackName,
    deployed: deployed !== null,
    template,
    parameters,
    tags,
    hasChanges: template.length > 0 || parameters.length > 0 || tags.length > 0,
  };
};

export const isStackDiff = (value: unknown): value is StackDiff =>
  typeof value === 'object' &&
  value !== null &&
  'stackName' in value &&
  typeof value.stackName === 'string' &&
  'hasChanges' in value &&
  typeof value.hasChanges === 'boolean' &&
  'template' in value &&
  Array.isArray(value.template) &&
  'parameters' in value &&
  Array.isArray(value.parameters) &&
  'tags' in value &&
  Array.isArray(value.tags);
