type Level = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

let debugEnabled = false;

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

function stamp(): string {
  return new Date().toISOString().slice(11, 19);
}

function write(level: Level, args: unknown[]): void {
  const prefix = `[${stamp()}] | ${level} |`;
  if (level === 'ERROR' || level === 'WARN') {
    console.error(prefix, ...args);
  } else {
    console.log(prefix, ...args);
  }
}

export const logger = {
  debug: (...args: unknown[]): void => {
    if (debugEnabled) write('DEBUG', args);
  },
  info: (...args: unknown[]): void => write('INFO', args),
  warn: (...args: unknown[]): void => write('WARN', args),
  error: (...args: unknown[]): void => write('ERROR', args),
};
