import type { BugRef } from './types';

export type LastVisitErrorCode =
  | 'login_required'
  | 'param_required'
  | 'invalid_param'
  | 'user_not_involved'
  | 'bug_access_denied'
  | 'bug_id_does_not_exist';

/** Base class for every failure this service reports to a caller. */
export class LastVisitError extends Error {
  readonly code: LastVisitErrorCode;
  readonly status: number;
  readonly details?: Record<string, unknown>;

  constructor(
    code: LastVisitErrorCode,
    status: number,
    message: string,
    options?: { details?: Record<string, unknown>; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'LastVisitError';
    this.code = code;
    this.status = status;
    this.details = options?.details;
  }
}

export class AuthenticationRequiredError extends LastVisitError {
  constructor() {
    super('login_required', 401, 'You must log in before using this part of the API.');
    this.name = 'AuthenticationRequiredError';
  }
}

export class ValidationError extends LastVisitError {
  constructor(
    code: Extract<LastVisitErrorCode, 'param_required' | 'invalid_param'>,
    param: string,
    message?: string,
  ) {
    super(code, 400, message ?? `The function requires a '${param}' argument.`, {
      details: { param },
    });
    this.name = 'ValidationError';
  }
}

export class AuthorizationError extends LastVisitError {
  constructor(code: Extract<LastVisitErrorCode, 'user_not_involved' | 'bug_access_denied'>, bug: BugRef) {
    super(
      code,
      403,
      code === 'user_not_involved'
        ? `You are not involved in bug ${bug}.`
        : `You are not authorized to access bug ${bug}.`,
      { details: { bug_id: bug } },
    );
    this.name = 'AuthorizationError';
  }
}

export class NotFoundError extends LastVisitError {
  constructor(bug: BugRef) {
    super('bug_id_does_not_exist', 404, `Bug ${bug} does not exist.`, { details: { bug_id: bug } });
    this.name = 'NotFoundError';
  }
}
