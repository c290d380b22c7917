import { describe, it, expect } from 'vitest';
import {
  BoxpackError, ConfigError, ParseError, InvalidWeightError, InvalidArticleIdError,
  InvalidBoxCountError, EmptyInputError, exitCodeFor, formatError
} from '../src/errors/index.js';

describe('Error Classes', () => {
  it('ConfigError has correct exit code', () => {
    expect(exitCodeFor(new ConfigError('Invalid YAML'))).toBe(10);
  });

  it('ParseError has correct exit code', () => {
    expect(exitCodeFor(new ParseError('Not a number', 'weights.txt'))).toBe(30);
  });

  it('input errors have distinct exit codes', () => {
    expect(exitCodeFor(new InvalidWeightError(-1, 0))).toBe(40);
    expect(exitCodeFor(new InvalidArticleIdError(1.5))).toBe(41);
    expect(exitCodeFor(new InvalidBoxCountError(0))).toBe(42);
    expect(exitCodeFor(new EmptyInputError())).toBe(43);
  });

  it('falls back to 1 for unknown errors', () => {
    expect(exitCodeFor(new Error('boom'))).toBe(1);
    expect(exitCodeFor(new BoxpackError('boom', 'X'))).toBe(1);
  });

  it('carries codes and inspectable details', () => {
    const err = new InvalidWeightError(-3, 7);
    expect(err).toBeInstanceOf(BoxpackError);
    expect(err.code).toBe('INVALID_WEIGHT');
    expect(err.weight).toBe(-3);
    expect(err.articleId).toBe(7);
    expect(err.message).toBe('Weight of article 7 must be a finite number >= 0, not -3');

    const boxErr = new InvalidBoxCountError(-2);
    expect(boxErr.code).toBe('INVALID_BOX_COUNT');
    expect(boxErr.boxCount).toBe(-2);
  });

  it('formats errors for JSON output', () => {
    const formatted = formatError(new ParseError('Bad weight', 'in.yaml'), 'json');
    expect(JSON.parse(formatted)).toEqual({
      error: 'ParseError',
      message: 'Bad weight',
      exitCode: 30,
      file: 'in.yaml',
    });
  });

  it('formats errors for text output', () => {
    expect(formatError(new EmptyInputError(), 'text')).toBe('Error [EmptyInputError]: No articles to pack');
  });
});
