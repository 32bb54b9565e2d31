// MARK: - Scheduling Errors
// Error taxonomy shared by the registry, the store and the dispatcher

export type SchedulingErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_STATE'
  | 'CONFLICT'
  | 'INVALID_TRIGGER'
  | 'INVALID_PAYLOAD'
  | 'UNKNOWN_TIMEZONE'
  | 'TRANSIENT_STORE'
  | 'DELIVERY_FAILED';

export class SchedulingError extends Error {
  readonly code: SchedulingErrorCode;

  constructor(code: SchedulingErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends SchedulingError {
  constructor(entity: 'schedule' | 'template' | 'tenant', key: string) {
    super('NOT_FOUND', `No ${entity} found for "${key}"`);
  }
}

export class InvalidStateError extends SchedulingError {
  constructor(operation: string, state: string) {
    super('INVALID_STATE', `Cannot ${operation} a schedule that is ${state}`);
  }
}

export class ConflictError extends SchedulingError {
  constructor(message: string) {
    super('CONFLICT', message);
  }
}

export class InvalidTriggerError extends SchedulingError {
  constructor(message: string) {
    super('INVALID_TRIGGER', message);
  }
}

export class InvalidPayloadError extends SchedulingError {
  constructor(message: string) {
    super('INVALID_PAYLOAD', message);
  }
}

export class UnknownTimezoneError extends SchedulingError {
  readonly timezone: string;

  constructor(timezone: string) {
    super('UNKNOWN_TIMEZONE', `Unknown timezone "${timezone}"`);
    this.timezone = timezone;
  }
}

export class TransientStoreError extends SchedulingError {
  constructor(message: string, cause?: unknown) {
    super('TRANSIENT_STORE', message, { cause });
  }
}

export class DeliveryFailedError extends SchedulingError {
  constructor(reason: string) {
    super('DELIVERY_FAILED', `Delivery failed: ${reason}`);
  }
}

export function isSchedulingError(error: unknown): error is SchedulingError {
  return error instanceof SchedulingError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function errorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}

/**
 * User-facing copy for errors returned by the registry
 */
export function describeSchedulingError(error: SchedulingError): string {
  switch (error.code) {
    case 'NOT_FOUND':
      return `❌ ${error.message}.`;
    case 'INVALID_STATE':
      return `⚠️ ${error.message}.`;
    case 'CONFLICT':
      return `⚠️ ${error.message}.`;
    case 'INVALID_TRIGGER':
      return `❌ **Invalid Schedule**\n\n${error.message}.`;
    case 'INVALID_PAYLOAD':
      return `❌ ${error.message}.`;
    case 'UNKNOWN_TIMEZONE':
      return (
        `❌ **Invalid Timezone**\n\n` +
        `${error.message}. Use an IANA name such as \`UTC\`, \`America/New_York\` or \`Europe/London\`.`
      );
    case 'TRANSIENT_STORE':
      return '⚠️ The schedule store is temporarily unavailable. Please try again in a moment.';
    case 'DELIVERY_FAILED':
      return `⚠️ ${error.message}.`;
  }
}
