export interface Logger {
  info(message: string): void;
  warn(message: string, error?: unknown): void;
  error(message: string, error?: unknown): void;
}

function timestamp(): string {
  return new Date().toISOString().replace("T", " ").replace(/\.\d+Z/, "");
}

/**
 * Console logger that prefixes every line with a timestamp and a scope.
 */
export function createLogger(scope: string): Logger {
  const prefix = () => `[${timestamp()}] [${scope}]`;

  return {
    info(message) {
      console.log(`${prefix()} ${message}`);
    },
    warn(message, error) {
      if (error === undefined) {
        console.warn(`${prefix()} ${message}`);
      } else {
        console.warn(`${prefix()} ${message}`, error);
      }
    },
    error(message, error) {
      if (error === undefined) {
        console.error(`${prefix()} ${message}`);
      } else {
        console.error(`${prefix()} ${message}`, error);
      }
    },
  };
}
