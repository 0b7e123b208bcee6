/**
 * HTTP error taxonomy. Anything thrown from routing, binding, codecs or a
 * handler that is an {@link HttpError} is written with its own status and
 * message; everything else becomes a 500.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message?: string, options?: { cause?: unknown }) {
    super(message ?? code, options);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

export class BadRequestError extends HttpError {
  constructor(message = 'Bad Request', options?: { cause?: unknown }) {
    super(400, 'BadRequest', message, options);
  }
}

export class ParameterBindingError extends BadRequestError {
  readonly parameter: string;

  constructor(parameter: string, reason: string, options?: { cause?: unknown }) {
    super(`${reason}: ${parameter}`, options);
    this.parameter = parameter;
  }
}

export class PathSafetyError extends BadRequestError {
  constructor(message = 'Invalid path', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'Not Found') {
    super(404, 'NotFound', message);
  }
}

export class RouteNotFoundError extends NotFoundError {
  constructor(path: string) {
    super(`No route matches ${path}`);
  }
}

export class MethodNotAllowedError extends HttpError {
  readonly allowedMethods: string[];

  constructor(allowedMethods: string[]) {
    super(405, 'MethodNotAllowed', 'Method Not Allowed');
    this.allowedMethods = allowedMethods;
  }
}

export class NotAcceptableError extends HttpError {
  readonly acceptable: string[];

  constructor(acceptable: string[]) {
    super(406, 'NotAcceptable', `Not Acceptable, expected one of: ${acceptable.join(', ')}`);
    this.acceptable = acceptable;
  }
}

export class UnsupportedMediaTypeError extends HttpError {
  constructor(contentType: string) {
    super(415, 'UnsupportedMediaType', `Unsupported media type: ${contentType || '(none)'}`);
  }
}

export class InternalServerError extends HttpError {
  constructor(message = 'Internal Server Error', options?: { cause?: unknown }) {
    super(500, 'InternalServerError', message, options);
  }
}

export class CodecUnavailableError extends InternalServerError {
  readonly mediaType: string;

  constructor(mediaType: string, direction: 'encode' | 'decode') {
    super(`No ${direction === 'encode' ? 'encoder' : 'decoder'} for ${mediaType || '(none)'}`);
    this.mediaType = mediaType;
  }
}

/** Usage error: a body consumed twice, a send after close. Never retried. */
export class IllegalStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IllegalStateError';
  }
}

export function isHttpError(e: unknown): e is HttpError {
  return e instanceof HttpError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
