export class SelectorValidationError extends Error {
  override readonly name = 'SelectorValidationError';

  constructor(
    readonly path: string,
    message: string,
  ) {
    super(`Invalid selector at ${path}: ${message}`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnknownTableError extends Error {
  override readonly name = 'UnknownTableError';

  constructor(readonly table: string) {
    super(`Table '${table}' does not exist`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnknownFieldError extends Error {
  override readonly name = 'UnknownFieldError';

  constructor(
    readonly table: string,
    readonly fields: readonly string[],
  ) {
    super(`Unknown field(s) for table '${table}': ${fields.join(', ')}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TableStoreError extends Error {
  override readonly name = 'TableStoreError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AuthenticationError extends Error {
  override readonly name = 'AuthenticationError';

  constructor(message = 'Missing or invalid API key') {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
