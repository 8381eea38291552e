// node/src/utils/errorResponse.ts: JSON bodies of the agent routes

export interface FieldIssue {
  path: string;
  message: string;
}

export type ApiErrorCode = 'bad_request' | 'not_found' | 'internal_error';

export type ApiBody<T> =
  | { success: true; data: T }
  | { success: false; message: string; code: ApiErrorCode; errors?: FieldIssue[] };

export function createSuccessResponse<T>(data: T): ApiBody<T> {
  return { success: true, data };
}

/** `errors` is omitted when there are no field issues. */
export function createErrorResponse(code: ApiErrorCode, message: string, issues: FieldIssue[] = []): ApiBody<never> {
  return issues.length > 0 ? { success: false, message, code, errors: issues } : { success: false, message, code };
}
