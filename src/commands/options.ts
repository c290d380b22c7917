import { InvalidArgumentError } from 'commander';

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError(`expected an integer >= 1 (got "${value}")`);
  }
  return n;
}

export function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError(`expected an integer >= 0 (got "${value}")`);
  }
  return n;
}

export function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError(`expected an integer (got "${value}")`);
  }
  return n;
}

export function parseSizeList(value: string): number[] {
  return value.split(',').map(part => parsePositiveInt(part.trim()));
}
