/**
 * Error taxonomy for the asset engine
 */

export type AssetEngineErrorCode = 'NOT_FOUND' | 'OUT_OF_ORDER_RESET' | 'REJECTED' | 'UNKNOWN_VIEW';

export class AssetEngineError extends Error {
  readonly code: AssetEngineErrorCode;

  constructor(code: AssetEngineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Mutation on a path the tracker has never seen (or has since removed) */
export class NotFoundError extends AssetEngineError {
  readonly path: string;

  constructor(path: string) {
    super('NOT_FOUND', `Unknown asset: ${path}`);
    this.path = path;
  }
}

export class OutOfOrderResetError extends AssetEngineError {
  readonly current: number;
  readonly requested: number;

  constructor(current: number, requested: number) {
    super(
      'OUT_OF_ORDER_RESET',
      `Session reset to ${formatTimestamp(requested)} precedes current start ${formatTimestamp(current)}`
    );
    this.current = current;
    this.requested = requested;
  }
}

function formatTimestamp(value: number): string {
  return Number.isFinite(value) ? new Date(value).toISOString() : String(value);
}

export type RejectionReason = 'total-quota' | 'session-quota' | 'no-evictable-handle';

export class AdmissionRejectedError extends AssetEngineError {
  readonly reason: RejectionReason;

  constructor(reason: RejectionReason) {
    super('REJECTED', `Preview resource unavailable (${reason}), retry later`);
    this.reason = reason;
  }
}

export class UnknownViewError extends AssetEngineError {
  readonly view: string;

  constructor(view: string) {
    super('UNKNOWN_VIEW', `Unknown view: ${view}`);
    this.view = view;
  }
}
