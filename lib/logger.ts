const isDev = process.env.NODE_ENV === "development";

export type LogContext = Record<string, unknown>;

export type Logger = {
  debug: (message: string, ctx?: LogContext) => void;
  info: (message: string, ctx?: LogContext) => void;
  warn: (message: string, ctx?: LogContext) => void;
  error: (message: string, ctx?: LogContext) => void;
};

/**
 * Scoped console logger, e.g. createLogger("calibration") prints "[calibration] message { ... }".
 * Debug lines are emitted in development only.
 */
export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  const withCtx = (ctx?: LogContext): unknown[] => (ctx && Object.keys(ctx).length > 0 ? [ctx] : []);
  return {
    debug: (message, ctx) => {
      if (!isDev) return;
      console.debug(tag, message, ...withCtx(ctx));
    },
    info: (message, ctx) => console.log(tag, message, ...withCtx(ctx)),
    warn: (message, ctx) => console.warn(tag, message, ...withCtx(ctx)),
    error: (message, ctx) => console.error(tag, message, ...withCtx(ctx)),
  };
}
