/**
 * @fileoverview Pino-backed singleton logger with RFC5424 level names,
 * structured request contexts and redaction of sensitive fields.
 *
 * The logger stays silent until {@link Logger.initialize} is called, so
 * modules (and tests) can hold a reference to it before the entry point has
 * decided on a level.
 * @module src/utils/internal/logger
 */
import { existsSync, mkdirSync } from 'node:fs';
import { createRequire } from 'node:module';
import path from 'node:path';

import type { LevelWithSilent, Logger as PinoLogger } from 'pino';
import pino from 'pino';

import { config, type LogLevel } from '../../config/index.js';
import { sanitization } from '../security/sanitization.js';
import {
  requestContextService,
  type RequestContext,
} from './requestContext.js';

const levelToPino: Record<LogLevel, LevelWithSilent> = {
  emerg: 'fatal',
  alert: 'fatal',
  crit: 'error',
  error: 'error',
  warning: 'warn',
  notice: 'info',
  info: 'info',
  debug: 'debug',
};

const pinoLevelSeverity: Record<string, number> = {
  fatal: 0,
  error: 3,
  warn: 4,
  info: 6,
  debug: 7,
};

export class Logger {
  private static readonly instance: Logger = new Logger();
  private pinoLogger?: PinoLogger;
  private initialized = false;
  private currentLevel: LogLevel = 'info';

  private constructor() {
    // Safe to construct at import time; nothing is written before initialize().
  }

  public static getInstance(): Logger {
    return Logger.instance;
  }

  private createPinoLogger(level: LogLevel): PinoLogger {
    const pinoOptions: pino.LoggerOptions = {
      level: levelToPino[level],
      base: {
        service: config.pkg.name,
        version: config.pkg.version,
        env: config.environment,
        pid: process.pid,
      },
      redact: {
        paths: sanitization.getSensitivePinoFields(),
        censor: '[REDACTED]',
      },
    };

    const transports: pino.TransportTargetOptions[] = [];

    if (config.environment === 'development') {
      // pino-pretty is optional at runtime; fall back to JSON when it is absent.
      try {
        const require = createRequire(import.meta.url);
        transports.push({
          target: require.resolve('pino-pretty'),
          options: { colorize: true, translateTime: 'yyyy-mm-dd HH:MM:ss' },
        });
      } catch (err) {
        console.warn(
          `[Logger Init] Pretty transport unavailable (${err instanceof Error ? err.message : String(err)}); falling back to stdout JSON.`,
        );
        transports.push({ target: 'pino/file', options: { destination: 1 } });
      }
    } else if (config.environment !== 'testing') {
      transports.push({ target: 'pino/file', options: { destination: 1 } });
    }

    if (config.logsPath) {
      try {
        if (!existsSync(config.logsPath)) {
          mkdirSync(config.logsPath, { recursive: true });
        }
        transports.push({
          level: levelToPino[level],
          target: 'pino/file',
          options: {
            destination: path.join(config.logsPath, 'combined.log'),
            mkdir: true,
          },
        });
        transports.push({
          level: 'error',
          target: 'pino/file',
          options: {
            destination: path.join(config.logsPath, 'error.log'),
            mkdir: true,
          },
        });
      } catch (err) {
        console.error(
          `[Logger Init] Failed to configure file logging: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    }

    if (transports.length === 0) {
      return pino(pinoOptions);
    }
    return pino({ ...pinoOptions, transport: { targets: transports } });
  }

  public initialize(level: LogLevel = 'info'): void {
    if (this.initialized) {
      this.warning(
        'Logger already initialized.',
        requestContextService.createRequestContext({
          operation: 'loggerReinit',
        }),
      );
      return;
    }
    this.currentLevel = level;
    this.pinoLogger = this.createPinoLogger(level);
    this.initialized = true;
    this.info(
      `Logger initialized. Level: ${level}.`,
      requestContextService.createRequestContext({ operation: 'loggerInit' }),
    );
  }

  /**
   * Flushes pending writes. The init container exits right after the run,
   * so the entry point awaits this before calling `process.exit`.
   */
  public async close(): Promise<void> {
    if (!this.initialized) return;
    const pinoLogger = this.pinoLogger;
    if (pinoLogger) {
      await new Promise<void>((resolve) => {
        pinoLogger.flush((err) => {
          if (err) console.error('Error flushing logger:', err);
          resolve();
        });
      });
    }
    this.initialized = false;
  }

  private log(
    level: LogLevel,
    msg: string,
    context?: RequestContext,
    error?: Error,
  ): void {
    if (!this.pinoLogger || !this.initialized) return;

    const pinoLevel = levelToPino[level];
    const levelSeverity = pinoLevelSeverity[pinoLevel];
    const currentSeverity = pinoLevelSeverity[levelToPino[this.currentLevel]];
    if (
      levelSeverity !== undefined &&
      currentSeverity !== undefined &&
      levelSeverity > currentSeverity
    ) {
      return;
    }

    const logObject: Record<string, unknown> = { ...context };
    if (error) logObject.err = pino.stdSerializers.err(error);

    this.pinoLogger[pinoLevel](logObject, msg);
  }

  public debug(msg: string, context?: RequestContext): void {
    this.log('debug', msg, context);
  }
  public info(msg: string, context?: RequestContext): void {
    this.log('info', msg, context);
  }
  public notice(msg: string, context?: RequestContext): void {
    this.log('notice', msg, context);
  }
  public warning(msg: string, context?: RequestContext): void {
    this.log('warning', msg, context);
  }

  public error(
    msg: string,
    errorOrContext: Error | RequestContext,
    context?: RequestContext,
  ): void {
    const errorObj =
      errorOrContext instanceof Error ? errorOrContext : undefined;
    const actualContext =
      errorOrContext instanceof Error ? context : errorOrContext;
    this.log('error', msg, actualContext, errorObj);
  }
}

export const logger = Logger.getInstance();
