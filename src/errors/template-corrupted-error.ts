/**
 * Error thrown when a local issue template cannot be loaded or parsed
 */

export class TemplateCorruptedError extends Error {
  public readonly templatePath: string;
  public readonly problems: string[];
  public readonly cause?: Error;

  constructor(message: string, templatePath: string, problems: string[], cause?: Error) {
    super(message);
    this.name = 'TemplateCorruptedError';
    this.templatePath = templatePath;
    this.problems = problems;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TemplateCorruptedError);
    }
  }
}
