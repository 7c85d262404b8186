export type WorkflowErrorCode =
  | 'DUPLICATE_ID'
  | 'NOT_FOUND'
  | 'UNKNOWN_USER'
  | 'NOT_ASSIGNED'
  | 'SOURCE_NOT_FOUND'
  | 'INVALID_USER_CONTACT'
  | 'UNSUPPORTED_DELIVERY_METHOD'
  | 'UNSUPPORTED_FORMAT'
  | 'ALREADY_ASSIGNED'
  | 'PROGRESS_REGRESSION'
  | 'RESOURCE_UNAVAILABLE';

export class WorkflowError extends Error {
  readonly code: WorkflowErrorCode;

  constructor(code: WorkflowErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WorkflowError';
    this.code = code;
  }
}

export class DuplicateIdError extends WorkflowError {
  constructor(kind: 'text' | 'user', id: string) {
    super('DUPLICATE_ID', `${kind === 'text' ? 'Text' : 'User'} with ID '${id}' already exists`);
    this.name = 'DuplicateIdError';
  }
}

export class NotFoundError extends WorkflowError {
  constructor(textId: string) {
    super('NOT_FOUND', `Text with ID '${textId}' not found`);
    this.name = 'NotFoundError';
  }
}

export class UnknownUserError extends WorkflowError {
  constructor(userId: string) {
    super('UNKNOWN_USER', `User with ID '${userId}' not found`);
    this.name = 'UnknownUserError';
  }
}

export class NotAssignedError extends WorkflowError {
  constructor(userId: string, textId: string) {
    super('NOT_ASSIGNED', `User '${userId}' is not translating text '${textId}'`);
    this.name = 'NotAssignedError';
  }
}

export class SourceNotFoundError extends WorkflowError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super('SOURCE_NOT_FOUND', `Text file not found: ${path}`, { cause });
    this.name = 'SourceNotFoundError';
    this.path = path;
  }
}

export class InvalidUserContactError extends WorkflowError {
  constructor(message: string) {
    super('INVALID_USER_CONTACT', message);
    this.name = 'InvalidUserContactError';
  }
}

export class UnsupportedDeliveryMethodError extends WorkflowError {
  constructor(method: string) {
    super('UNSUPPORTED_DELIVERY_METHOD', `Unsupported delivery method: ${method}`);
    this.name = 'UnsupportedDeliveryMethodError';
  }
}

export class UnsupportedFormatError extends WorkflowError {
  constructor(format: string) {
    super('UNSUPPORTED_FORMAT', `Unsupported output format: ${format}`);
    this.name = 'UnsupportedFormatError';
  }
}

export class AlreadyAssignedError extends WorkflowError {
  constructor(userId: string, textId: string) {
    super('ALREADY_ASSIGNED', `User '${userId}' is already translating text '${textId}'`);
    this.name = 'AlreadyAssignedError';
  }
}

export class ProgressRegressionError extends WorkflowError {
  constructor(userId: string, textId: string, current: number, requested: number) {
    super(
      'PROGRESS_REGRESSION',
      `Cannot move '${userId}' on '${textId}' back from sentence ${current} to ${requested}`
    );
    this.name = 'ProgressRegressionError';
  }
}

export class ResourceUnavailableError extends WorkflowError {
  constructor(message: string) {
    super('RESOURCE_UNAVAILABLE', message);
    this.name = 'ResourceUnavailableError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
