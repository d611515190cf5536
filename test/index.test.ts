import * as cmdwise from '../src/index.js';

describe('package entry', () => {
  it('exposes the loop and its collaborators', () => {
    expect(typeof cmdwise.RetryOrchestrator).toBe('function');
    expect(typeof cmdwise.createRiskClassifier).toBe('function');
    expect(typeof cmdwise.ShellCommandExecutor).toBe('function');
    expect(typeof cmdwise.CommandProviderClient).toBe('function');
    expect(typeof cmdwise.createLLMProvider).toBe('function');
    expect(cmdwise.EXIT_CODES.retriesExhausted).toBe(3);
  });

  it('classifies with the built-in table', () => {
    const classifier = cmdwise.createRiskClassifier();

    expect(classifier.classify({ command: 'ls -la' })).toBe('safe');
    expect(classifier.classify({ command: 'rm -rf build' })).toBe('dangerous');
  });
});
