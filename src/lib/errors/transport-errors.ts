/**
 * Transport integration errors
 *
 * Typed errors raised while naming, configuring or using managed transports.
 * Malformed transport names are never reported through these classes: a name that
 * cannot be decoded simply identifies a transport this library does not manage.
 */

/**
 * Base class for all transport integration errors
 */
export abstract class TransportIntegrationError extends Error {
  abstract readonly code: string;
  abstract readonly type: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;

    // Support proper stack traces
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Raised by a registration resolver when no registration matches an identifier
 */
export class RegistrationNotFoundError extends TransportIntegrationError {
  readonly code = 'REGISTRATION_NOT_FOUND';
  readonly type = 'registration';

  static forIdentifier(registrationId: string): RegistrationNotFoundError {
    return new RegistrationNotFoundError(
      `No client registration was found for the identifier '${registrationId}'`,
      { registrationId },
    );
  }
}

/**
 * Raised when the primary handler of a managed transport cannot carry TLS client certificates
 */
export class UnsupportedHandlerError extends TransportIntegrationError {
  readonly code = 'UNSUPPORTED_HANDLER';
  readonly type = 'configuration';

  static requires(requiredType: string, actualType: string): UnsupportedHandlerError {
    return new UnsupportedHandlerError(
      `The primary handler of a managed transport must be an instance of ${requiredType} (found ${actualType})`,
      { requiredType, actualType },
    );
  }
}

/**
 * Raised when a transport name cannot be built from the supplied values
 */
export class InvalidTransportNameError extends TransportIntegrationError {
  readonly code = 'INVALID_TRANSPORT_NAME';
  readonly type = 'naming';

  static emptyValue(property: string): InvalidTransportNameError {
    return new InvalidTransportNameError(`The '${property}' property cannot be empty`, {
      property,
    });
  }

  static reservedCharacter(property: string): InvalidTransportNameError {
    return new InvalidTransportNameError(
      `The '${property}' property contains a reserved separator character`,
      { property },
    );
  }
}

/**
 * Raised when a response body exceeds the transport's buffering limit
 */
export class ResponseTooLargeError extends TransportIntegrationError {
  readonly code = 'RESPONSE_TOO_LARGE';
  readonly type = 'transport';

  static exceeded(url: string, limit: number): ResponseTooLargeError {
    return new ResponseTooLargeError(
      `The response returned by ${url} exceeds the maximum buffer size of ${limit} bytes`,
      { url, limit },
    );
  }
}

/**
 * Raised when certificate material cannot be parsed
 */
export class InvalidCertificateError extends TransportIntegrationError {
  readonly code = 'INVALID_CERTIFICATE';
  readonly type = 'certificate';

  static unreadable(reason: string, source?: string): InvalidCertificateError {
    return new InvalidCertificateError(
      `The certificate${source ? ` from ${source}` : ''} could not be parsed: ${reason}`,
      { reason, source },
    );
  }
}

/**
 * Union type for all transport integration errors
 */
export type TransportIntegrationErrorType =
  | RegistrationNotFoundError
  | UnsupportedHandlerError
  | InvalidTransportNameError
  | ResponseTooLargeError
  | InvalidCertificateError;

export function isRegistrationNotFoundError(error: unknown): error is RegistrationNotFoundError {
  return error instanceof RegistrationNotFoundError;
}

export function isUnsupportedHandlerError(error: unknown): error is UnsupportedHandlerError {
  return error instanceof UnsupportedHandlerError;
}

export function isTransportIntegrationError(
  error: unknown,
): error is TransportIntegrationErrorType {
  return error instanceof TransportIntegrationError;
}
