import * as fs from 'fs';
import * as path from 'path';
import { getConfigDir } from './config-paths.js';
import { createValidator, formatSchemaIssues, toSchemaIssues, type SchemaIssue } from './schema-validator.js';
import type { ProviderCredential } from '../llm/endpoints/endpoint-config.js';

/**
 * Credentials validation error
 */
export class CredentialsValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: SchemaIssue[]
  ) {
    super(message);
    this.name = 'CredentialsValidationError';
  }
}

/**
 * Structure of <configDir>/credentials.json
 */
export interface CredentialsFile {
  $schema?: string;
  providers?: Record<string, ProviderCredential>;
}

export const CREDENTIALS_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  title: 'cmdwise credentials',
  description: 'API keys and base URL overrides per provider',
  type: 'object',
  properties: {
    $schema: { type: 'string' },
    providers: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        properties: {
          apiKey: { type: 'string' },
          baseUrl: { type: 'string' },
        },
        additionalProperties: false,
      },
    },
  },
  additionalProperties: false,
};

export function getCredentialsPath(): string {
  return path.join(getConfigDir(), 'credentials.json');
}

export function validateCredentials(credentials: unknown): CredentialsFile {
  const validate = createValidator().compile<CredentialsFile>(CREDENTIALS_SCHEMA);

  if (!validate(credentials)) {
    const errors = toSchemaIssues(validate.errors);
    throw new CredentialsValidationError(`Invalid credentials: ${formatSchemaIssues(errors)}`, errors);
  }

  return credentials;
}

/**
 * Load credentials.json.
 * Returns null if the file doesn't exist, throws CredentialsValidationError if it is invalid.
 */
export function loadCredentialsFile(credentialsPath: string = getCredentialsPath()): CredentialsFile | null {
  if (!fs.existsSync(credentialsPath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(credentialsPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CredentialsValidationError(`Invalid credentials: ${message}`, [{ path: '/', message }]);
  }

  return validateCredentials(parsed);
}

export function getProviderCredential(
  providerId: string,
  credentialsPath?: string
): ProviderCredential | undefined {
  return loadCredentialsFile(credentialsPath)?.providers?.[providerId];
}
