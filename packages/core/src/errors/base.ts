/**
 * Root of the package's error hierarchy. Callers branch on `module` and
 * `operation` instead of matching message text.
 */
export abstract class TreeCipherError extends Error {
  /** Area that raised the error: `cipher`, `tree` or `arguments` */
  public readonly module: string;

  public readonly operation?: string | undefined;

  /** Structured detail for logs; never holds key material */
  public readonly context?: Record<string, unknown> | undefined;

  public readonly timestamp: Date;

  constructor(
    message: string,
    module: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.module = module;
    this.operation = operation;
    this.context = context;
    this.timestamp = new Date();

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Same error, same subclass, with `additionalContext` merged over the
   * existing context. The receiver is left unchanged.
   */
  withContext(additionalContext: Record<string, unknown>): this {
    const copy: this = Object.create(Object.getPrototypeOf(this));
    Object.assign(copy, this);
    Object.defineProperty(copy, 'message', { value: this.message, writable: true });
    Object.defineProperty(copy, 'stack', { value: this.stack, writable: true });
    Object.defineProperty(copy, 'context', {
      value: { ...this.context, ...additionalContext },
      enumerable: true,
    });
    return copy;
  }
}

export function isTreeCipherError(error: unknown): error is TreeCipherError {
  return error instanceof TreeCipherError;
}
