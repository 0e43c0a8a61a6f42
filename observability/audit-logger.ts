import type { FastifyBaseLogger } from 'fastify';

export interface AuditLogEntry {
  timestamp: number;
  requestId?: string;
  eventType: 'tool_call' | 'ingestion' | 'error';
  data: Record<string, unknown>;
}

export interface AuditLogger {
  log(entry: AuditLogEntry): void | Promise<void>;
}

export class ConsoleAuditLogger implements AuditLogger {
  log(entry: AuditLogEntry): void {
    const logLine = JSON.stringify({
      ...entry,
      timestamp: new Date(entry.timestamp).toISOString()
    });
    console.log(`[AUDIT] ${logLine}`);
  }
}

/** Writes audit entries through the server's pino logger so they share its level and transport. */
export class PinoAuditLogger implements AuditLogger {
  constructor(private readonly logger: FastifyBaseLogger) {}

  log(entry: AuditLogEntry): void {
    const payload = { audit: entry.eventType, requestId: entry.requestId, ...entry.data };
    if (entry.eventType === 'error') {
      this.logger.error(payload, 'audit');
      return;
    }
    this.logger.info(payload, 'audit');
  }
}

const SENSITIVE_FIELDS = [
  'password',
  'secret',
  'apikey',
  'api_key',
  'token',
  'authorization',
  'bearer',
  'credential',
  'cookie',
  'session'
];

/** Masks `key: value` / `key=value` pairs and long token-like strings inside free text. */
export function redactString(text: string): string {
  let redacted = text;

  for (const pattern of SENSITIVE_FIELDS) {
    const regex = new RegExp(`(${pattern}\\s*[:=]\\s*)([^\\s,;}\\]\\)]+)`, 'gi');
    redacted = redacted.replace(regex, (match: string, prefix: string, value: string) => {
      if (value.length > 8 || /[-_]/.test(value)) {
        return `${prefix}[REDACTED]`;
      }
      return match;
    });
  }

  // Bare tokens: 32+ chars of key alphabet with at least one digit.
  return redacted.replace(/\b(?=[A-Za-z0-9_-]*\d)[A-Za-z0-9_-]{32,}\b/g, '[REDACTED]');
}

export function redactObject(obj: unknown, visited: WeakSet<object> = new WeakSet()): unknown {
  if (obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (visited.has(obj)) {
    return '[CIRCULAR]';
  }
  visited.add(obj);

  if (Array.isArray(obj)) {
    return obj.map((item: unknown) => redactObject(item, visited));
  }

  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_FIELDS.some((pattern) => lowerKey.includes(pattern))) {
      result[key] = '[REDACTED]';
    } else {
      result[key] = redactObject(value, visited);
    }
  }

  return result;
}

export class StructuredAuditLogger implements AuditLogger {
  constructor(private readonly logger: AuditLogger = new ConsoleAuditLogger()) {}

  async logToolCall(params: {
    requestId?: string;
    toolName: string;
    input: unknown;
    success: boolean;
    durationMs: number;
    errorCode?: number;
    error?: string;
  }): Promise<void> {
    await this.log({
      timestamp: Date.now(),
      requestId: params.requestId,
      eventType: 'tool_call',
      data: {
        toolName: params.toolName,
        input: redactObject(params.input),
        success: params.success,
        durationMs: params.durationMs,
        errorCode: params.errorCode,
        error: params.error ? redactString(params.error) : undefined
      }
    });
  }

  async logIngestion(params: {
    source: string;
    status: 'published' | 'failed';
    loaded: number;
    succeeded: number;
    failed: number;
    durationMs: number;
    error?: string;
  }): Promise<void> {
    await this.log({
      timestamp: Date.now(),
      eventType: 'ingestion',
      data: {
        ...params,
        error: params.error ? redactString(params.error) : undefined
      }
    });
  }

  async logError(params: {
    requestId?: string;
    error: string;
    context?: Record<string, unknown>;
  }): Promise<void> {
    await this.log({
      timestamp: Date.now(),
      requestId: params.requestId,
      eventType: 'error',
      data: {
        error: redactString(params.error),
        context: params.context ? redactObject(params.context) : undefined
      }
    });
  }

  async log(entry: AuditLogEntry): Promise<void> {
    const result = this.logger.log(entry);
    if (result instanceof Promise) {
      await result;
    }
  }
}
