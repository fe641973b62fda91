export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

let verbose = false;

/** Debug lines are dropped unless verbose output was requested (e.g. `--verbose`). */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function isVerbose(): boolean {
  return verbose;
}

// Diagnostics go to stderr so stdout stays clean for piping into fzf and friends.
export function createLogger(component: string): Logger {
  const write = (level: string, message: string, args: unknown[]) => {
    const prefix = level === 'info' ? '' : `${level.toUpperCase()} `;
    console.error(`[${component}] ${new Date().toISOString()} ${prefix}${message}`, ...args);
  };

  return {
    debug: (message, ...args) => {
      if (verbose) write('debug', message, args);
    },
    info: (message, ...args) => write('info', message, args),
    warn: (message, ...args) => write('warn', message, args),
    error: (message, ...args) => write('error', message, args),
  };
}
