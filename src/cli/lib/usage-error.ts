export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseNonNegativeInt(value: string, flag: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new UsageError(`${flag} expects a non-negative integer, got "${value}"`);
  }
  return parsed;
}

export function parsePositiveInt(value: string, flag: string): number {
  const parsed = parseNonNegativeInt(value, flag);
  if (parsed === 0) {
    throw new UsageError(`${flag} must be greater than 0`);
  }
  return parsed;
}
