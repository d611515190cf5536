import Ajv2020 from 'ajv/dist/2020.js';
import type { ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';

export interface SchemaIssue {
  path: string;
  message: string;
}

/**
 * Create AJV validator instance
 */
export function createValidator(): Ajv2020 {
  const ajv = new Ajv2020({ allErrors: true, strict: false });
  addFormats(ajv);
  return ajv;
}

export function toSchemaIssues(errors: ErrorObject[] | null | undefined): SchemaIssue[] {
  return (errors || []).map((err) => ({
    path: err.instancePath || '/',
    message: err.message || 'Unknown validation error',
  }));
}

export function formatSchemaIssues(issues: SchemaIssue[]): string {
  return issues.map((e) => `${e.path}: ${e.message}`).join('; ');
}
