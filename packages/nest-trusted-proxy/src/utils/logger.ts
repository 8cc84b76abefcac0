import { LoggerPort } from './logger.interface';

export class TrustedProxyLogger implements LoggerPort {
  constructor(private readonly scope = 'nest-trusted-proxy') {}

  debug(message: string, meta?: Record<string, unknown>): void {
    this.print('DEBUG', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.print('INFO', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.print('WARN', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.print('ERROR', message, meta);
  }

  private print(level: string, message: string, meta?: Record<string, unknown>): void {
    const line = `[${this.scope}] [${level}] ${message}`;
    // eslint-disable-next-line no-console
    const write = level === 'ERROR' ? console.error : level === 'WARN' ? console.warn : console.log;
    if (meta && Object.keys(meta).length > 0) {
      write(line, meta);
      return;
    }
    write(line);
  }
}
