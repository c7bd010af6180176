export class ConfigValidationError extends Error {
  constructor(
    readonly field: string,
    readonly constraint: string
  ) {
    super(`Invalid configuration: ${field}: ${constraint}`);
    this.name = 'ConfigValidationError';
  }
}

export class LocalizationMissingError extends Error {
  constructor(
    readonly language: string,
    readonly available: string[]
  ) {
    super(
      `No localization found for language '${language}'` +
        (available.length ? ` (available: ${available.join(', ')})` : '')
    );
    this.name = 'LocalizationMissingError';
  }
}

/** Recoverable: only the file it names loses its rows. */
export class MalformedHunkError extends Error {
  constructor(
    readonly filePath: string,
    readonly header: string
  ) {
    super(`Malformed hunk header in ${filePath}: ${header}`);
    this.name = 'MalformedHunkError';
  }
}

export class SinkWriteError extends Error {
  constructor(
    readonly outputPath: string,
    readonly reason: string
  ) {
    super(`Could not write ${outputPath}: ${reason}`);
    this.name = 'SinkWriteError';
  }
}
