export class SwitchyardError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'SwitchyardError';
    this.code = code;
  }
}

export class NamespaceNotFoundError extends SwitchyardError {
  readonly namespace: string;

  constructor(namespace: string) {
    super(`Namespace ${namespace} was not found`, 'NAMESPACE_NOT_FOUND');
    this.name = 'NamespaceNotFoundError';
    this.namespace = namespace;
  }
}

export class NoCandidateError extends SwitchyardError {
  readonly namespace: string;
  readonly query: string;

  constructor(namespace: string, query: string) {
    super(`No operation in namespace ${namespace} matched the request`, 'NO_CANDIDATE');
    this.name = 'NoCandidateError';
    this.namespace = namespace;
    this.query = query;
  }
}

export class MissingCredentialError extends SwitchyardError {
  readonly model: string;

  constructor(model: string, detail?: string) {
    super(detail ? `No API key configured for model ${model}: ${detail}` : `No API key configured for model ${model}`, 'MISSING_CREDENTIAL');
    this.name = 'MissingCredentialError';
    this.model = model;
  }
}

export class SchemaViolationError extends SwitchyardError {
  readonly issues: unknown;

  constructor(message: string, issues?: unknown) {
    super(message, 'SCHEMA_VIOLATION');
    this.name = 'SchemaViolationError';
    this.issues = issues;
  }
}

export class UnknownNamespaceError extends SchemaViolationError {
  readonly namespace: string;
  readonly known: string[];

  constructor(namespace: string, known: string[]) {
    super(`Selected namespace ${namespace} is not one of: ${known.join(', ')}`, { namespace, known });
    this.name = 'UnknownNamespaceError';
    this.namespace = namespace;
    this.known = known;
  }
}

export class UnsupportedMethodError extends SwitchyardError {
  readonly method: string;

  constructor(method: string) {
    super(`Unsupported HTTP method: ${method}`, 'UNSUPPORTED_METHOD');
    this.name = 'UnsupportedMethodError';
    this.method = method;
  }
}

export class RemoteCallFailureError extends SwitchyardError {
  readonly url: string;
  readonly statusCode: number | null;
  readonly details: unknown;

  constructor(message: string, options: { url: string; statusCode?: number | null; details?: unknown; cause?: unknown }) {
    super(message, 'REMOTE_CALL_FAILED');
    this.name = 'RemoteCallFailureError';
    this.url = options.url;
    this.statusCode = options.statusCode ?? null;
    this.details = options.details;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class OracleError extends SwitchyardError {
  readonly task: string;
  readonly details: unknown;

  constructor(task: string, message: string, details?: unknown) {
    super(`Oracle task ${task} failed: ${message}`, 'ORACLE_FAILED');
    this.name = 'OracleError';
    this.task = task;
    this.details = details;
  }
}

export class DocumentNotFoundError extends SwitchyardError {
  readonly namespace: string;
  readonly documentId: string;

  constructor(namespace: string, documentId: string) {
    super(`Document ${documentId} was not found in namespace ${namespace}`, 'DOCUMENT_NOT_FOUND');
    this.name = 'DocumentNotFoundError';
    this.namespace = namespace;
    this.documentId = documentId;
  }
}
