import { ENV } from "../env";

type LogMeta = Record<string, unknown>;

export interface TaggedLogger {
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
}

function write(sink: (...args: unknown[]) => void, tag: string, msg: string, meta?: LogMeta) {
  if (meta) {
    sink(`[${tag}] ${msg}`, JSON.stringify(meta));
  } else {
    sink(`[${tag}] ${msg}`);
  }
}

/**
 * Console logger that prefixes every line with `[tag]`. Debug lines are
 * written only when COSTING_LOG_VERBOSE is true.
 */
export function createLogger(tag: string, options: { verbose?: boolean } = {}): TaggedLogger {
  const verbose = options.verbose ?? ENV.COSTING_LOG_VERBOSE;
  return {
    info: (msg, meta) => write(console.log, tag, msg, meta),
    warn: (msg, meta) => write(console.warn, tag, msg, meta),
    error: (msg, meta) => write(console.error, tag, msg, meta),
    debug: (msg, meta) => {
      if (verbose) write(console.log, tag, msg, meta);
    },
  };
}
