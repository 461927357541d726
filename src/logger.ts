const RESET = '\x1b[0m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';

function colorize(color: string, text: string): string {
  return `${color}${text}${RESET}`;
}

/**
 * JSON.stringify replacer that swaps repeated object references for "[Circular]"
 */
function circularReplacer(): (key: string, value: unknown) => unknown {
  const seen = new WeakSet<object>();
  return (_key, value) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  };
}

export function logWarning(message: string): void {
  console.log(colorize(YELLOW, message));
}

export function logInfo(message: string): void {
  console.log(colorize(GREEN, message));
}

/**
 * Logs a titled block of data. Strings are printed as-is, anything else as
 * indented JSON.
 */
export function logData(title: string, data: unknown): void {
  console.log('');
  console.log(colorize(CYAN, `== ${title} ==`));
  console.log(typeof data === 'string' ? data : JSON.stringify(data, circularReplacer(), 2));
}

/**
 * Logs an error with its stack trace, followed by its cause when it has one.
 * Values that are not `Error` instances go to `console.error`.
 */
export function logError(error: unknown, title?: string | null): void {
  if (!(error instanceof Error)) {
    console.error(colorize(RED, String(error)));
    return;
  }

  if (title) {
    console.log('');
    console.log(`== ${title} ==`);
  }

  console.log(colorize(RED, error.stack ?? error.message));

  const cause: unknown = error.cause;
  if (cause === undefined || cause === null) {
    return;
  }

  console.log('');
  console.log(colorize(RED, '== Error Cause =='));
  if (cause instanceof Error) {
    console.log(colorize(RED, cause.stack ?? cause.message));
  } else {
    console.log(colorize(RED, JSON.stringify(cause, circularReplacer(), 2)));
  }
}
