import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  RiskTableValidationError,
  loadDefaultRiskTable,
  loadRiskPatterns,
  loadRiskTableFile,
  mergeRiskTables,
  validateRiskTable,
} from '../../../src/infra/risk/risk-table-loader.js';
import { RiskClassifier } from '../../../src/infra/risk/risk-classifier.js';
import type { RiskPatternTable } from '../../../src/domain/risk/types.js';

const customTable: RiskPatternTable = {
  version: 1,
  patterns: [
    { id: 'deploy', tier: 'dangerous', category: 'system', description: 'Production deploy', programs: ['deploy'] },
    { id: 'file_delete', tier: 'dangerous', category: 'filesystem', description: 'Any delete', programs: ['rm'] },
  ],
};

describe('risk table loader', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cmdwise-risk-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeTable(value: unknown): string {
    const file = path.join(tmpDir, 'risk.json');
    fs.writeFileSync(file, JSON.stringify(value));
    return file;
  }

  it('validates the built-in table', () => {
    const table = loadDefaultRiskTable();
    expect(table.version).toBe(1);
    expect(table.patterns.length).toBeGreaterThan(20);
  });

  it('rejects entries without programs or pattern', () => {
    expect(() =>
      validateRiskTable({ version: 1, patterns: [{ id: 'x', tier: 'caution', category: 'system', description: 'x' }] })
    ).toThrow(RiskTableValidationError);
  });

  it('rejects unknown tiers', () => {
    expect(() =>
      validateRiskTable({
        version: 1,
        patterns: [{ id: 'x', tier: 'safe', category: 'system', description: 'x', programs: ['x'] }],
      })
    ).toThrow(RiskTableValidationError);
  });

  it('rejects duplicate ids and broken patterns', () => {
    let caught: unknown;
    try {
      validateRiskTable({
        version: 1,
        patterns: [
          { id: 'a', tier: 'caution', category: 'system', description: 'a', pattern: '(' },
          { id: 'a', tier: 'caution', category: 'system', description: 'b', programs: ['b'] },
        ],
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(RiskTableValidationError);
    if (!(caught instanceof RiskTableValidationError)) return;
    expect(caught.errors.map((issue) => issue.path)).toEqual(['/patterns/0/pattern', '/patterns/1/id']);
  });

  it('reports unreadable files as validation errors', () => {
    const file = path.join(tmpDir, 'broken.json');
    fs.writeFileSync(file, '{ not json');
    expect(() => loadRiskTableFile(file)).toThrow(RiskTableValidationError);
  });

  it('merges by id, later entries winning', () => {
    const merged = mergeRiskTables(
      { version: 1, patterns: [{ id: 'file_delete', tier: 'caution', category: 'filesystem', description: 'Delete', programs: ['rm'] }] },
      customTable
    );
    expect(merged.patterns.map((entry) => [entry.id, entry.tier])).toEqual([
      ['file_delete', 'dangerous'],
      ['deploy', 'dangerous'],
    ]);
  });

  it('extends the built-in table with a user file', () => {
    const classifier = new RiskClassifier(loadRiskPatterns({ path: writeTable(customTable), extend: true }));

    expect(classifier.classify({ command: 'deploy --prod' })).toBe('dangerous');
    expect(classifier.classify({ command: 'rm notes.txt' })).toBe('dangerous');
    expect(classifier.classify({ command: 'mv a b' })).toBe('caution');
  });

  it('replaces the built-in table when not extending', () => {
    const classifier = new RiskClassifier(loadRiskPatterns({ path: writeTable(customTable), extend: false }));

    expect(classifier.classify({ command: 'deploy --prod' })).toBe('dangerous');
    expect(classifier.classify({ command: 'mv a b' })).toBe('safe');
  });
});
