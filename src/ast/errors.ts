/**
 * Raised when input cannot be turned into an AST at all. Everything past
 * that point degrades locally and is reported as a diagnostic instead.
 */
export class AstLoadError extends Error {
  constructor(
    message: string,
    public readonly format: 'xml' | 'json',
    public readonly details: string[] = []
  ) {
    super(message);
    this.name = 'AstLoadError';
  }
}
