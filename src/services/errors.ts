export class FetchError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, options: { url: string; status?: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.url = options.url;
    this.status = options.status;
  }
}

export class ParseError extends Error {
  readonly url: string;

  constructor(message: string, options: { url: string }) {
    super(message);
    this.name = "ParseError";
    this.url = options.url;
  }
}

export type NotifyFailureReason = "not_configured" | "http" | "network";

export interface NotifyErrorContext {
  reason: NotifyFailureReason;
  status?: number;
  source?: string;
  keyword?: string;
  itemId?: string;
  cause?: unknown;
}

export class NotifyError extends Error {
  readonly reason: NotifyFailureReason;
  readonly status?: number;
  readonly source?: string;
  readonly keyword?: string;
  readonly itemId?: string;

  constructor(message: string, context: NotifyErrorContext) {
    super(message, { cause: context.cause });
    this.name = "NotifyError";
    this.reason = context.reason;
    this.status = context.status;
    this.source = context.source;
    this.keyword = context.keyword;
    this.itemId = context.itemId;
  }
}

export class StoreIOError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`Seen item store ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = "StoreIOError";
    this.operation = operation;
  }
}

export class SourceConfigError extends Error {
  readonly configPath: string;

  constructor(message: string, configPath: string, cause?: unknown) {
    super(message, { cause });
    this.name = "SourceConfigError";
    this.configPath = configPath;
  }
}

export class CycleInProgressError extends Error {
  constructor() {
    super("Monitor cycle already running");
    this.name = "CycleInProgressError";
  }
}
