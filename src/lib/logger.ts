export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  error(tag: string, error: unknown): void;
}

function clock(d: Date): string {
  return [d.getHours(), d.getMinutes(), d.getSeconds()].map((n) => String(n).padStart(2, "0")).join(":");
}

/** Console logger; debug lines only print when verbose. */
export function createLogger(verbose: boolean): Logger {
  return {
    debug(message) {
      if (verbose) console.log(`[${clock(new Date())}] ${message}`);
    },
    info(message) {
      console.log(message);
    },
    error(tag, error) {
      console.error(`[${tag}]`, error);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  error() {},
};
