export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    info(message) {
      // Not through getReportRuntimeConfig(), which warns on every call while the domain-error policy is invalid.
      if (process.env.REPORT_QUIET === "1") return;
      console.log(`${prefix} ${message}`);
    },
    warn(message) {
      console.warn(`${prefix} ${message}`);
    },
    error(message) {
      console.error(`${prefix} ${message}`);
    },
  };
}
