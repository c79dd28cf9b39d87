/**
 * Application errors
 *
 * AppError carries an HTTP status and a stable code; the global Fastify
 * error handler in app.ts turns it into `{ ok: false, error, message }`.
 * The ingest taxonomy below extends it so a failure surfacing through the
 * admin API keeps its code.
 */

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

// ═══════════════════════════════════════════════════════════════
// INGEST ERROR TAXONOMY
// ═══════════════════════════════════════════════════════════════

/** A source could not be reached or reported a non-success status. */
export class TransportFailure extends AppError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super('TRANSPORT_FAILURE', `[${source}] ${message}`, 502, options);
    this.source = source;
  }
}

/** The decoded response is missing the structure the adapter needs. */
export class PayloadShapeError extends AppError {
  readonly source: string;
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super('PAYLOAD_SHAPE_ERROR', `[${source}] invalid payload: ${issues.join('; ')}`, 502);
    this.source = source;
    this.issues = issues;
  }
}

/** One data point inside an otherwise valid payload is unusable. */
export class ObservationParseError extends AppError {
  readonly rawValue: string;

  constructor(rawValue: string, message: string) {
    super('OBSERVATION_PARSE_ERROR', message, 422);
    this.rawValue = rawValue;
  }
}

/** The store gateway rejected a read or write. */
export class StoreWriteFailure extends AppError {
  readonly seriesType: string;
  readonly date: string;

  constructor(seriesType: string, date: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? 'unknown');
    super('STORE_WRITE_FAILURE', `store call failed for ${seriesType}@${date}: ${reason}`, 500, options);
    this.seriesType = seriesType;
    this.date = date;
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super('CONFIG_ERROR', message, 500);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
