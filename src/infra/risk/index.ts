export { RiskClassifier, createRiskClassifier, splitSegments, extractPrograms } from './risk-classifier.js';
export {
  RiskTableValidationError,
  RISK_TABLE_SCHEMA,
  validateRiskTable,
  loadDefaultRiskTable,
  loadRiskTableFile,
  mergeRiskTables,
  compileRiskTable,
  loadRiskPatterns,
  type RiskTableOptions,
} from './risk-table-loader.js';
