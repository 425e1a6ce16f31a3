export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class NoCallbackPortError extends ConfigurationError {
  readonly ports: readonly number[];

  constructor(ports: readonly number[]) {
    super(
      `Could not start OAuth callback server on any of ports ${ports.join(', ')}. ` +
        'Use the --console flag instead.'
    );
    this.name = 'NoCallbackPortError';
    this.ports = ports;
  }
}

export class AuthorizationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthorizationError';
  }
}

export class AuthorizationTimeoutError extends AuthorizationError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Timed out after ${Math.round(timeoutMs / 1000)}s waiting for the authorization callback`);
    this.name = 'AuthorizationTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class MailSendError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MailSendError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
