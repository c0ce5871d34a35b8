import { ZodError } from 'zod';
import {
  DocumentNotFoundError,
  MissingCredentialError,
  NamespaceNotFoundError,
  NoCandidateError,
  OracleError,
  RemoteCallFailureError,
  SchemaViolationError,
  SwitchyardError,
  UnsupportedMethodError
} from '@switchyard/pipeline';

export interface ErrorResponse {
  statusCode: number;
  message: string;
  code?: string;
  details?: unknown;
}

const fromPipelineError = (statusCode: number, error: SwitchyardError, details?: unknown): ErrorResponse => ({
  statusCode,
  message: error.message,
  code: error.code,
  details
});

export const mapErrorToResponse = (error: unknown): ErrorResponse => {
  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      message: 'Request validation failed',
      details: error.flatten()
    };
  }

  if (
    error instanceof NamespaceNotFoundError ||
    error instanceof NoCandidateError ||
    error instanceof DocumentNotFoundError
  ) {
    return fromPipelineError(404, error);
  }

  if (error instanceof MissingCredentialError) {
    return fromPipelineError(412, error);
  }

  if (error instanceof SchemaViolationError) {
    return fromPipelineError(422, error, error.issues);
  }

  if (error instanceof UnsupportedMethodError) {
    return fromPipelineError(422, error);
  }

  if (error instanceof RemoteCallFailureError) {
    return fromPipelineError(502, error, { url: error.url, statusCode: error.statusCode, response: error.details });
  }

  if (error instanceof OracleError) {
    return fromPipelineError(502, error);
  }

  return {
    statusCode: 500,
    message: 'Unexpected error'
  };
};
