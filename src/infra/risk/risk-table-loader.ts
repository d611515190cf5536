import * as fs from 'fs';
import defaultRiskPatterns from './default-risk-patterns.json';
import {
  createValidator,
  formatSchemaIssues,
  toSchemaIssues,
  type SchemaIssue,
} from '../config/schema-validator.js';
import type { CompiledRiskPattern, RiskPatternTable } from '../../domain/risk/types.js';

export class RiskTableValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: SchemaIssue[]
  ) {
    super(message);
    this.name = 'RiskTableValidationError';
  }
}

export const RISK_TABLE_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  title: 'cmdwise risk patterns',
  type: 'object',
  required: ['version', 'patterns'],
  properties: {
    $schema: { type: 'string' },
    version: { const: 1 },
    patterns: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'tier', 'category', 'description'],
        anyOf: [{ required: ['programs'] }, { required: ['pattern'] }],
        properties: {
          id: { type: 'string', pattern: '^[a-z0-9_]+$' },
          tier: { enum: ['caution', 'dangerous'] },
          category: {
            enum: [
              'filesystem',
              'disk',
              'permissions',
              'process',
              'service',
              'network',
              'package',
              'git',
              'system',
              'privilege',
            ],
          },
          description: { type: 'string', minLength: 1 },
          programs: { type: 'array', items: { type: 'string', minLength: 1 }, minItems: 1 },
          pattern: { type: 'string', minLength: 1 },
          examples: { type: 'array', items: { type: 'string' } },
        },
        additionalProperties: false,
      },
    },
  },
  additionalProperties: false,
};

/**
 * Schema check plus the rules JSON Schema can't express:
 * unique ids and compilable patterns.
 */
export function validateRiskTable(value: unknown, source: string = 'risk table'): RiskPatternTable {
  const validate = createValidator().compile<RiskPatternTable>(RISK_TABLE_SCHEMA);

  if (!validate(value)) {
    const errors = toSchemaIssues(validate.errors);
    throw new RiskTableValidationError(`Invalid ${source}: ${formatSchemaIssues(errors)}`, errors);
  }

  const errors: SchemaIssue[] = [];
  const seen = new Set<string>();
  value.patterns.forEach((entry, index) => {
    if (seen.has(entry.id)) {
      errors.push({ path: `/patterns/${index}/id`, message: `duplicate id "${entry.id}"` });
    }
    seen.add(entry.id);

    if (entry.pattern !== undefined) {
      try {
        new RegExp(entry.pattern, 'i');
      } catch (error) {
        errors.push({
          path: `/patterns/${index}/pattern`,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
  });

  if (errors.length > 0) {
    throw new RiskTableValidationError(`Invalid ${source}: ${formatSchemaIssues(errors)}`, errors);
  }

  return value;
}

export function loadDefaultRiskTable(): RiskPatternTable {
  return validateRiskTable(defaultRiskPatterns, 'default-risk-patterns.json');
}

export function loadRiskTableFile(filePath: string): RiskPatternTable {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RiskTableValidationError(`Cannot read ${filePath}: ${message}`, [{ path: '/', message }]);
  }
  return validateRiskTable(parsed, filePath);
}

/**
 * Entries in `extension` replace same-id entries in `base`; new ids are appended.
 */
export function mergeRiskTables(base: RiskPatternTable, extension: RiskPatternTable): RiskPatternTable {
  const byId = new Map(base.patterns.map((entry) => [entry.id, entry]));
  for (const entry of extension.patterns) {
    byId.set(entry.id, entry);
  }
  return { version: 1, patterns: [...byId.values()] };
}

export function compileRiskTable(table: RiskPatternTable): CompiledRiskPattern[] {
  return table.patterns.map((entry) => ({
    id: entry.id,
    tier: entry.tier,
    category: entry.category,
    description: entry.description,
    programs: new Set((entry.programs ?? []).map((program) => program.toLowerCase())),
    regex: entry.pattern !== undefined ? new RegExp(entry.pattern, 'i') : undefined,
  }));
}

export interface RiskTableOptions {
  /** User table; empty or undefined means built-in only */
  path?: string;
  /** Merge the user table into the built-in one instead of replacing it */
  extend?: boolean;
}

export function loadRiskPatterns(options: RiskTableOptions = {}): CompiledRiskPattern[] {
  const builtIn = loadDefaultRiskTable();
  if (!options.path) {
    return compileRiskTable(builtIn);
  }

  const custom = loadRiskTableFile(options.path);
  return compileRiskTable(options.extend === false ? custom : mergeRiskTables(builtIn, custom));
}
