export interface LoadError {
  path: string;
  reason: string;
}

export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised when a load produced no usable template, or when no store has been
 * loaded yet. Carries the per-document errors of the failed load.
 */
export class StoreEmptyError extends EngineError {
  constructor(
    message: string,
    public readonly errors: LoadError[] = []
  ) {
    super(message);
  }
}

export class EmptyDocumentError extends EngineError {
  constructor() {
    super('Document text is empty');
  }
}

export class TemplateNotFoundError extends EngineError {
  constructor(public readonly templateId: string) {
    super(`Template not found: ${templateId}`);
  }
}

export class ConfigError extends EngineError {
  constructor(
    message: string,
    public readonly keys: string[] = []
  ) {
    super(message);
  }
}
