/**
 * Tracing policy. Tracing is active when `enabled` or `logResponses` is
 * set; `include`/`exclude` then select stores by name prefix.
 */
export interface TracerSettings {
  enabled?: boolean;

  /** Log a line when each call starts (default: true) */
  logRequests?: boolean;

  /** Append results and written values to completion lines (default: false) */
  logResponses?: boolean;

  /** Trace only stores whose name starts with one of these; empty means all */
  include?: string[];

  /** Never trace stores whose name starts with one of these. Wins over include. */
  exclude?: string[];
}
