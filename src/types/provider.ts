import type { OnFailure } from './stack.js';

export interface DeployStackInput {
  stackName: string;
  templateBody: string;
  parameters: Record<string, string>;
  tags: Record<string, string>;
  timeoutInMinutes?: number;
  disableRollback?: boolean;
  onFailure?: OnFailure;
}

export interface StackNameInput {
  stackName: string;
}

export interface StackDescription {
  stackName: string;
  /** Provider status such as CREATE_COMPLETE or UPDATE_ROLLBACK_IN_PROGRESS. */
  status: string;
  statusReason?: string;
  parameters: Record<string, string>;
  outputs: Record<string, string>;
  tags: Record<string, string>;
  createdAt: string;
  updatedAt?: string | null;
}

export interface TemplateValidation {
  description?: string;
  parameters: string[];
  outputs: string[];
  /** Default values of the parameters that declare one. */
  parameterDefaults?: Record<string, string>;
}

/**
 * Remote infrastructure API. Calls throw ProviderError for API failures;
 * retries and backoff are the client's concern.
 */
export interface ProviderClient {
  createStack(input: DeployStackInput): Promise<void>;
  updateStack(input: DeployStackInput): Promise<void>;
  deleteStack(input: StackNameInput): Promise<void>;
  cancelUpdateStack(input: StackNameInput): Promise<void>;
  describeStack(input: StackNameInput): Promise<StackDescription | null>;
  getStackOutputs(input: StackNameInput): Promise<Record<string, string>>;
  /** Template body the stack was last deployed with, or null when it does not exist. */
  getTemplate(input: StackNameInput): Promise<string | null>;
  validateTemplate(input: { templateBody: string }): Promise<TemplateValidation>;
}

export interface SessionKey {
  region?: string;
  profile?: string;
}

export type ProviderClientFactory = (key: SessionKey) => Promise<ProviderClient>;
