/**
 * Error types raised by the seed and layer pipelines.
 */

export class AttackWorkbookError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AttackWorkbookError';
  }
}

/** A requested option value is not acceptable for the selected domain. */
export class ValidationError extends AttackWorkbookError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** The technique source could not be fetched or parsed. */
export class SourceError extends AttackWorkbookError {
  constructor(
    message: string,
    public statusCode?: number,
  ) {
    super(message);
    this.name = 'SourceError';
  }
}

export class MissingColumnError extends AttackWorkbookError {
  constructor(
    public column: string,
    public sheetName: string,
  ) {
    super(`Worksheet "${sheetName}" has no "${column}" column`);
    this.name = 'MissingColumnError';
  }
}

export class WorksheetNotFoundError extends AttackWorkbookError {
  constructor(
    public sheetName: string,
    public available: string[],
  ) {
    super(
      `Worksheet "${sheetName}" not found. Available: ${available.length > 0 ? available.join(', ') : '(none)'}`,
    );
    this.name = 'WorksheetNotFoundError';
  }
}
