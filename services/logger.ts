type Level = 'info' | 'warn' | 'error';

let silenced = false;

// Tests flip this to keep the console quiet.
export const setLogSilenced = (value: boolean) => {
  silenced = value;
};

const write = (level: Level, scope: string, message: string, detail?: unknown) => {
  if (silenced) return;
  const line = `[${scope}] ${message}`;
  const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
  if (detail === undefined) sink(line);
  else sink(line, detail);
};

export const createLogger = (scope: string) => ({
  info: (message: string, detail?: unknown) => write('info', scope, message, detail),
  warn: (message: string, detail?: unknown) => write('warn', scope, message, detail),
  error: (message: string, detail?: unknown) => write('error', scope, message, detail),
});

export type Logger = ReturnType<typeof createLogger>;
