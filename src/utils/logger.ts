/**
 * Structured Logger Utility
 * Provides clean, consistent logging throughout the council
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR'
}

export interface LogContext {
  runId?: string;
  component?: string;
  providerId?: string;
  phase?: string;
  duration?: number;
  [key: string]: unknown;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.values(LogLevel).some((level) => level === value);
}

export class Logger {
  private static instance: Logger;
  private minLevel: LogLevel = LogLevel.DEBUG;
  private enableTimestamps: boolean = true;

  private constructor() {
    const envLevel = process.env.LOG_LEVEL?.toUpperCase();
    if (envLevel && isLogLevel(envLevel)) {
      this.minLevel = envLevel;
    }
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  setTimestamps(enabled: boolean): void {
    this.enableTimestamps = enabled;
  }

  private getLevelPriority(level: LogLevel): number {
    const priorities: Record<LogLevel, number> = {
      [LogLevel.DEBUG]: 0,
      [LogLevel.INFO]: 1,
      [LogLevel.WARN]: 2,
      [LogLevel.ERROR]: 3
    };
    return priorities[level];
  }

  private shouldLog(level: LogLevel): boolean {
    return this.getLevelPriority(level) >= this.getLevelPriority(this.minLevel);
  }

  private formatContext(ctx: LogContext): string {
    const parts: string[] = [];

    if (ctx.runId) {parts.push(`run=${ctx.runId.substring(0, 8)}`);}
    if (ctx.component) {parts.push(`comp=${ctx.component}`);}
    if (ctx.providerId) {parts.push(`provider=${ctx.providerId}`);}
    if (ctx.phase) {parts.push(`phase=${ctx.phase}`);}
    if (ctx.duration !== undefined) {parts.push(`duration=${ctx.duration}ms`);}

    return parts.length > 0 ? `[${parts.join(' | ')}]` : '';
  }

  formatMessage(level: LogLevel, message: string, ctx?: LogContext, data?: unknown): string {
    const parts: string[] = [];

    if (this.enableTimestamps) {
      parts.push(new Date().toISOString());
    }

    parts.push(`[${level}]`);

    if (ctx) {
      const contextStr = this.formatContext(ctx);
      if (contextStr) {parts.push(contextStr);}
    }

    parts.push(message);

    if (data !== undefined) {
      if (typeof data === 'string') {
        const maxLen = 500;
        parts.push(data.length > maxLen ? data.substring(0, maxLen) + '...' : data);
      } else {
        parts.push(JSON.stringify(data, null, 0));
      }
    }

    return parts.join(' ');
  }

  debug(message: string, ctx?: LogContext, data?: unknown): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage(LogLevel.DEBUG, message, ctx, data));
    }
  }

  info(message: string, ctx?: LogContext, data?: unknown): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.log(this.formatMessage(LogLevel.INFO, message, ctx, data));
    }
  }

  warn(message: string, ctx?: LogContext, data?: unknown): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage(LogLevel.WARN, message, ctx, data));
    }
  }

  error(message: string, ctx?: LogContext, data?: unknown): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage(LogLevel.ERROR, message, ctx, data));
    }
  }

  // Convenience methods for the deliberation lifecycle
  runStart(runId: string, prompt: string, providerCount: number): void {
    this.info('═══════════════════════════════════════════════════════════════');
    this.info('DELIBERATION START', { runId, component: 'Orchestration' });
    this.info(`Prompt: "${prompt.substring(0, 100)}${prompt.length > 100 ? '...' : ''}"`, { runId });
    this.info(`│ Council members: ${providerCount}`, { runId });
  }

  runComplete(runId: string, duration: number): void {
    this.info('DELIBERATION COMPLETE', { runId, duration });
    this.info('═══════════════════════════════════════════════════════════════');
  }

  runCancelled(runId: string, phase: string): void {
    this.warn('DELIBERATION CANCELLED', { runId, phase });
  }

  providerRequest(runId: string, providerId: string): void {
    this.debug('  ├─ Dispatching prompt', { runId, providerId });
  }

  providerResponse(runId: string, providerId: string, duration: number, contentLength: number): void {
    this.info(`  ├─ ✓ Testimony received (${contentLength} chars)`, { runId, providerId, duration });
  }

  providerFailure(runId: string, providerId: string, code: string, error: string): void {
    this.error(`  ├─ ✗ Provider abstained [${code}]: ${error}`, { runId, providerId });
  }

  synthesisStart(runId: string, testimonyCount: number): void {
    this.info('┌── SYNTHESIS ────────────────────────────────────────────────────', { runId });
    this.info(`│ Testimonies to process: ${testimonyCount}`, { runId });
  }

  synthesisComplete(runId: string, duration: number, contentLength: number): void {
    this.info(`└── SYNTHESIS COMPLETE (${contentLength} chars)`, { runId, duration });
  }

  streamingStart(runId: string, unitCount: number): void {
    this.debug(`Streaming verdict in ${unitCount} units`, { runId, phase: 'streaming' });
  }
}

export const logger = Logger.getInstance();
