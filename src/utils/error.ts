import { z } from 'zod';
import { ErrorCodes, RelayError } from '../types';

export interface ErrorBody {
  success: false;
  error: string;
  code: string;
}

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// Format error for a tool or RPC response
export function formatErrorForResponse(error: unknown): string {
  if (error instanceof RelayError) {
    let message = `${error.code}: ${error.message}`;

    if (error.suggestion) {
      message += `\n\nSuggestion: ${error.suggestion}`;
    }

    return message;
  }

  if (error instanceof z.ZodError) {
    return `${ErrorCodes.MALFORMED_INPUT}: Invalid arguments: ${formatZodIssues(error)}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

export function errorCode(error: unknown): string {
  if (error instanceof RelayError) {
    return error.code;
  }
  if (error instanceof z.ZodError) {
    return ErrorCodes.MALFORMED_INPUT;
  }
  return ErrorCodes.OPERATION_FAILED;
}

export function errorBody(error: unknown): ErrorBody {
  let message: string;
  if (error instanceof z.ZodError) {
    message = `Invalid arguments: ${formatZodIssues(error)}`;
  } else if (error instanceof Error) {
    message = error.message;
  } else {
    message = String(error);
  }
  return { success: false, error: message, code: errorCode(error) };
}
