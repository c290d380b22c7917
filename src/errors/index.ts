export class BoxpackError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'BoxpackError';
  }
}

export class ConfigError extends BoxpackError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class ParseError extends BoxpackError {
  constructor(message: string, public readonly file?: string) {
    super(message, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

export class InvalidWeightError extends BoxpackError {
  constructor(public readonly weight: number, public readonly articleId: number) {
    super(`Weight of article ${articleId} must be a finite number >= 0, not ${weight}`, 'INVALID_WEIGHT');
    this.name = 'InvalidWeightError';
  }
}

export class InvalidArticleIdError extends BoxpackError {
  constructor(public readonly articleId: number) {
    super(`Article id must be a safe integer, not ${articleId}`, 'INVALID_ARTICLE_ID');
    this.name = 'InvalidArticleIdError';
  }
}

export class InvalidBoxCountError extends BoxpackError {
  constructor(public readonly boxCount: number) {
    super(`Number of boxes must be an integer >= 1, not ${boxCount}`, 'INVALID_BOX_COUNT');
    this.name = 'InvalidBoxCountError';
  }
}

export class EmptyInputError extends BoxpackError {
  constructor() {
    super('No articles to pack', 'EMPTY_INPUT');
    this.name = 'EmptyInputError';
  }
}

// Exit code mapping
const EXIT_CODES: Record<string, number> = {
  ConfigError: 10,
  ParseError: 30,
  InvalidWeightError: 40,
  InvalidArticleIdError: 41,
  InvalidBoxCountError: 42,
  EmptyInputError: 43,
  BoxpackError: 1,
};

export function exitCodeFor(err: Error): number {
  return EXIT_CODES[err.name] ?? 1;
}

export function formatError(err: Error, format: 'json' | 'text' = 'text'): string {
  const exitCode = exitCodeFor(err);

  if (format === 'json') {
    return JSON.stringify({
      error: err.name,
      message: err.message,
      exitCode,
      ...(err instanceof ParseError && err.file ? { file: err.file } : {}),
    }, null, 2);
  }

  return `Error [${err.name}]: ${err.message}`;
}
