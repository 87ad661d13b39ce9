type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLevelName(value: string): value is keyof typeof LEVELS {
  return Object.hasOwn(LEVELS, value);
}

function threshold(): number {
  const configured = (process.env['LOG_LEVEL'] ?? 'info').toLowerCase();
  return isLevelName(configured) ? LEVELS[configured] : LEVELS.info;
}

function write(level: LogLevel, message: string): void {
  if (LEVELS[level] < threshold()) return;
  const line = `${new Date().toISOString()} [${level.toUpperCase()}] ${message}`;
  if (level === 'warn' || level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
}

export const log = {
  debug: (message: string): void => write('debug', message),
  info: (message: string): void => write('info', message),
  warn: (message: string): void => write('warn', message),
  error: (message: string): void => write('error', message),
};
