export class LogLensError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotConfiguredError extends LogLensError {
  constructor(message = 'Parameters have not been set.') {
    super(message);
  }
}

export class OutOfBoundsError extends LogLensError {
  constructor(message: string, public required?: number, public available?: number) {
    super(message);
  }
}

export class MalformedInputError extends LogLensError {
  constructor(message: string, public field?: string) {
    super(message);
  }
}

export class ConfigError extends LogLensError {
  constructor(message: string) {
    super(message);
  }
}

export class ABIError extends LogLensError {
  constructor(message: string) {
    super(message);
  }
}
