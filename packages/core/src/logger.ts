// pino-shaped so Fastify's logger (and req.log) can be passed straight in.
export interface Logger {
  debug(obj: Record<string, unknown>, msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
}

export function consoleLogger(tag = 'docbridge', opts: { debug?: boolean } = {}): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (obj, msg) => {
      if (opts.debug) console.debug(prefix, msg, obj);
    },
    info: (obj, msg) => console.info(prefix, msg, obj),
    warn: (obj, msg) => console.warn(prefix, msg, obj),
    error: (obj, msg) => console.error(prefix, msg, obj)
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};
