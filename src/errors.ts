// convert any error to DnsError (preserves DnsError and RetryableDnsError types)
export function toDnsError(error: unknown): DnsError {
  // already a DnsError or RetryableDnsError, return as-is
  if (error instanceof DnsError) {
    return error;
  }

  // extract message from Error or convert unknown to string
  const message =
    error instanceof Error ? error.message : String(error) || 'An unknown error occurred';

  // create DnsError instance
  const codedError = new (class extends DnsError {})(message);

  // if it's an Error, preserve the original error properties
  if (error instanceof Error) {
    codedError.name = error.name;
    codedError.stack = error.stack;
  } else {
    codedError.name = 'DnsError';
  }

  return codedError;
}

// base error class for custom errors with codes
// matches Node.js SystemError structure
export class DnsError extends Error {
  public code: number;
  public errno: number;
  public syscall: string;

  constructor(message: string) {
    super(message);
    this.name = 'DnsError';

    // SystemError-like properties
    // code: numeric error code (set by subclass property initializer or defaults to -1)
    // errno: numeric error code (always equals code)
    // syscall: always 'dns-walker'
    this.code = -1;
    this.errno = -1;
    this.syscall = 'dns-walker';

    Object.setPrototypeOf(this, new.target.prototype);

    // Maintain proper stack trace (Node.js only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  // whether a caller may reasonably repeat the operation
  // the resolver itself never retries, this is informational for callers
  shouldRetry() {
    return false;
  }
}

// abstract base class for transport failures a caller may retry
export class RetryableDnsError extends DnsError {
  constructor(message: string) {
    super(message);
    this.name = 'RetryableError';
  }

  shouldRetry() {
    return true;
  }
}

//-----------------------------------------
// codec errors
//-----------------------------------------

// decode needed more bytes than the buffer holds
export class TruncatedBufferError extends DnsError {
  public code = 413; // Payload Too Large

  constructor(message: string) {
    super(message);
    this.name = 'TruncatedBufferError';
    this.errno = this.code;
  }
}

// domain name that cannot be put on the wire
export class InvalidNameError extends DnsError {
  public code = 400; // Bad Request

  constructor(message: string) {
    super(message);
    this.name = 'InvalidNameError';
    this.errno = this.code;
  }
}

// malformed label found while decoding a name
export class InvalidLabelError extends DnsError {
  public code = 422; // Unprocessable Entity

  constructor(message: string) {
    super(message);
    this.name = 'InvalidLabelError';
    this.errno = this.code;
  }
}

// fixed-width field value out of range, or header counts that are not a query
export class InvalidFieldError extends DnsError {
  public code = 416; // Range Not Satisfiable

  constructor(message: string) {
    super(message);
    this.name = 'InvalidFieldError';
    this.errno = this.code;
  }
}

// compression pointers loop back to an offset already visited
export class CompressionCycleError extends DnsError {
  public code = 508; // Loop Detected

  constructor(message: string) {
    super(message);
    this.name = 'CompressionCycleError';
    this.errno = this.code;
  }
}

//-----------------------------------------
// resolver errors
//-----------------------------------------

// reply has no answer, no usable glue and no referral
export class NoResolutionPathError extends DnsError {
  public code = 404; // Not Found

  constructor(message: string) {
    super(message);
    this.name = 'NoResolutionPathError';
    this.errno = this.code;
  }
}

// too many queries for a single resolution
export class ResolutionDepthExceededError extends DnsError {
  public code = 310; // Too many redirects

  constructor(message: string) {
    super(message);
    this.name = 'ResolutionDepthExceededError';
    this.errno = this.code;
  }
}

// reply does not belong to the query that was sent
export class InvalidResponseError extends RetryableDnsError {
  public code = 502; // Bad Gateway

  constructor(message: string) {
    super(message);
    this.name = 'InvalidResponseError';
    this.errno = this.code;
  }
}

// DNS configuration error
export class ConfigurationError extends DnsError {
  public code = 500; // Internal Server Error

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.errno = this.code;
  }
}

//-----------------------------------------
// transport errors
//-----------------------------------------

// query timeout error
export class TimeoutError extends RetryableDnsError {
  public code = 408; // Request Timeout

  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
    // ensure errno matches code
    this.errno = this.code;
  }
}

// connection error
export class ConnectionError extends RetryableDnsError {
  public code = 503; // Service Unavailable

  constructor(message: string) {
    super(message);
    this.name = 'ConnectionError';
    this.errno = this.code;
  }
}

// AbortSignal cancellation error
export class AbortError extends DnsError {
  public code = 499; // Client Closed Request

  constructor(message: string) {
    super(message);
    this.name = 'AbortError';
    this.errno = this.code;
  }

  // never retry abort errors
  shouldRetry() {
    return false;
  }
}
