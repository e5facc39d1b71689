import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

/**
 * Clinical-grade logger with PII redaction
 * Patient names, identifiers and credentials never reach the log stream
 */

// PII patterns to redact from free text
const PII_PATTERNS = {
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  // Anthropic style API keys
  apiKey: /sk-[a-zA-Z0-9_-]{8,}/g,
  jwt: /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g,
  bearer: /Bearer\s+[a-zA-Z0-9_-]+/gi,
};

// Fields to completely redact (case-insensitive matching)
const REDACTED_FIELDS = [
  'name',
  'patientname',
  'fullname',
  'email',
  'phone',
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
  'x-api-key',
  'authorization',
  'cookie',
];

/**
 * Record fields that may be logged with a patient
 */
const PATIENT_LOG_FIELDS = new Set(['age', 'gender', 'bmi']);

/**
 * Mask credentials and e-mail addresses in free text
 */
export function redactText(text: string): string {
  let result = text;
  for (const pattern of Object.values(PII_PATTERNS)) {
    result = result.replace(pattern, '[REDACTED]');
  }
  return result;
}

/**
 * Recursively redact PII from an object
 */
export function redactObject(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    return redactText(obj);
  }

  if (Array.isArray(obj)) {
    return obj.map(redactObject);
  }

  if (typeof obj === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const keyLower = key.toLowerCase();
      const shouldRedact = REDACTED_FIELDS.some(
        (field) => keyLower === field || keyLower.includes(field)
      );
      redacted[key] = shouldRedact ? '[REDACTED]' : redactObject(value);
    }
    return redacted;
  }

  return obj;
}

/**
 * Keep only the non-identifying fields of a patient record
 */
export function summarizePatient(patient: unknown): Record<string, unknown> {
  if (typeof patient !== 'object' || patient === null) {
    return {};
  }

  return Object.fromEntries(
    Object.entries(patient).filter(([key]) => PATIENT_LOG_FIELDS.has(key))
  );
}

/**
 * Create a redaction function for Pino
 */
function createRedactor() {
  return {
    // Dotted paths only take identifier keys
    paths: REDACTED_FIELDS.filter((field) => /^[a-z_]+$/.test(field)).map((field) => `*.${field}`),
    censor: '[REDACTED]',
  };
}

export interface CreateLoggerOptions {
  name: string;
  level?: string;
  correlationId?: string;
  /** Defaults to stdout */
  destination?: DestinationStream;
}

/**
 * Serialize an error, masking credentials in its message and stack
 */
function serializeError(error: Error): unknown {
  return redactObject(pino.stdSerializers.err(error));
}

/**
 * Create a logger instance with PII redaction
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = process.env.LOG_LEVEL ?? 'info', correlationId, destination } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: createRedactor(),
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Use null to omit base, or provide correlationId if present
    base: correlationId ? { correlationId } : null,
    serializers: {
      err: serializeError,
      patient: summarizePatient,
    },
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

/**
 * Create a child logger with correlation ID
 */
export function withCorrelationId(logger: Logger, correlationId: string): Logger {
  return logger.child({ correlationId });
}

/**
 * Generate a correlation ID
 */
export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
}

export type { Logger };
