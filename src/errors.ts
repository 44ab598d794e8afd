/**
 * Protocol-level errors raised by the router
 */

export type ToolErrorKind = 'invalid_parameters' | 'execution' | 'not_found';
export type ResourceErrorKind = 'not_found' | 'execution';
export type PromptErrorKind = 'not_found' | 'invalid_parameters';

export abstract class RouterError<K extends string = string> extends Error {
  constructor(
    readonly kind: K,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ToolError extends RouterError<ToolErrorKind> {
  static invalidParameters(message: string): ToolError {
    return new ToolError('invalid_parameters', message);
  }

  static execution(message: string, cause?: unknown): ToolError {
    return new ToolError('execution', message, { cause });
  }

  static notFound(toolName: string): ToolError {
    return new ToolError('not_found', `Tool ${toolName} not found`);
  }
}

export class ResourceError extends RouterError<ResourceErrorKind> {
  static notFound(uri: string): ResourceError {
    return new ResourceError('not_found', `Resource ${uri} not found`);
  }
}

export class PromptError extends RouterError<PromptErrorKind> {
  static notFound(promptName: string): PromptError {
    return new PromptError('not_found', `Prompt ${promptName} not found`);
  }
}
