/**
 * @fileoverview Pino-backed singleton logger. Maps RFC5424 severities onto pino
 * levels, writes structured request contexts, redacts credential fields and
 * stays silent until `initialize()` has run.
 * @module src/utils/internal/logger
 */
import path from 'path';

import type { LevelWithSilent, Logger as PinoLogger } from 'pino';
import pino from 'pino';

import { type AppConfig, config } from '@/config/index.js';
import {
  requestContextService,
  type RequestContext,
} from '@/utils/internal/requestContext.js';
import { sanitization } from '@/utils/security/sanitization.js';

export type McpLogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'crit'
  | 'alert'
  | 'emerg';

const mcpToPinoLevel: Record<McpLogLevel, LevelWithSilent> = {
  emerg: 'fatal',
  alert: 'fatal',
  crit: 'error',
  error: 'error',
  warning: 'warn',
  notice: 'info',
  info: 'info',
  debug: 'debug',
};

const mcpLevelSeverity: Record<McpLogLevel, number> = {
  emerg: 0,
  alert: 1,
  crit: 2,
  error: 3,
  warning: 4,
  notice: 5,
  info: 6,
  debug: 7,
};

/** The parts of the application configuration the transport is built from. */
export type LoggerSettings = Pick<AppConfig, 'environment' | 'logsPath' | 'pkg'>;

export class Logger {
  private static readonly instance: Logger = new Logger();
  private pinoLogger?: PinoLogger;
  private initialized = false;
  private currentMcpLevel: McpLogLevel = 'info';

  private constructor() {}

  public static getInstance(): Logger {
    return Logger.instance;
  }

  private createPinoLogger(
    level: McpLogLevel,
    settings: LoggerSettings,
  ): PinoLogger {
    const pinoLevel = mcpToPinoLevel[level];

    const pinoOptions: pino.LoggerOptions = {
      level: pinoLevel,
      base: {
        env: settings.environment,
        version: settings.pkg.version,
        pid: process.pid,
      },
      redact: {
        paths: sanitization.getSensitivePinoFields(),
        censor: '[REDACTED]',
      },
    };

    const targets: pino.TransportTargetOptions[] = [];
    const isDevelopment = settings.environment === 'development';
    const isTest = settings.environment === 'testing';

    if (isDevelopment) {
      targets.push({
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'yyyy-mm-dd HH:MM:ss' },
      });
    } else if (!isTest) {
      targets.push({ target: 'pino/file', options: { destination: 1 } });
    }

    if (settings.logsPath) {
      targets.push({
        level: pinoLevel,
        target: 'pino/file',
        options: {
          destination: path.join(settings.logsPath, 'combined.log'),
          mkdir: true,
        },
      });
      targets.push({
        level: 'error',
        target: 'pino/file',
        options: {
          destination: path.join(settings.logsPath, 'error.log'),
          mkdir: true,
        },
      });
    }

    if (targets.length === 0) {
      return pino({ ...pinoOptions, enabled: false });
    }
    return pino({ ...pinoOptions, transport: { targets } });
  }

  /**
   * Builds the pino transport from `settings`; the module-level configuration
   * is used when a host passes none.
   */
  public initialize(
    level: McpLogLevel = 'info',
    settings: LoggerSettings = config,
  ): void {
    if (this.initialized) {
      this.warning(
        'Logger already initialized.',
        requestContextService.createRequestContext({
          operation: 'loggerReinit',
        }),
      );
      return;
    }
    this.currentMcpLevel = level;
    this.pinoLogger = this.createPinoLogger(level, settings);
    this.initialized = true;
    this.info(
      `Logger initialized. Level: ${level}.`,
      requestContextService.createRequestContext({ operation: 'loggerInit' }),
    );
  }

  public setLevel(newLevel: McpLogLevel): void {
    if (!this.pinoLogger || !this.initialized) {
      return;
    }
    this.currentMcpLevel = newLevel;
    this.pinoLogger.level = mcpToPinoLevel[newLevel];
    this.info(
      `Log level changed to ${newLevel}.`,
      requestContextService.createRequestContext({
        operation: 'loggerSetLevel',
      }),
    );
  }

  public async close(): Promise<void> {
    if (!this.initialized) return;
    this.info(
      'Logger shutting down.',
      requestContextService.createRequestContext({ operation: 'loggerClose' }),
    );

    const pinoLogger = this.pinoLogger;
    if (pinoLogger) {
      await new Promise<void>((resolve, reject) => {
        pinoLogger.flush((err) => (err ? reject(err) : resolve()));
      });
    }

    this.initialized = false;
  }

  public isInitialized(): boolean {
    return this.initialized;
  }

  private log(
    level: McpLogLevel,
    msg: string,
    context?: RequestContext,
    error?: Error,
  ): void {
    if (!this.pinoLogger || !this.initialized) return;
    if (mcpLevelSeverity[level] > mcpLevelSeverity[this.currentMcpLevel]) {
      return;
    }

    const logObject: Record<string, unknown> = { ...context };
    if (error) logObject.err = pino.stdSerializers.err(error);

    this.pinoLogger[mcpToPinoLevel[level]](logObject, msg);
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

  public crit(
    msg: string,
    errorOrContext: Error | RequestContext,
    context?: RequestContext,
  ): void {
    const errorObj =
      errorOrContext instanceof Error ? errorOrContext : undefined;
    const actualContext =
      errorOrContext instanceof Error ? context : errorOrContext;
    this.log('crit', msg, actualContext, errorObj);
  }

  public alert(
    msg: string,
    errorOrContext: Error | RequestContext,
    context?: RequestContext,
  ): void {
    const errorObj =
      errorOrContext instanceof Error ? errorOrContext : undefined;
    const actualContext =
      errorOrContext instanceof Error ? context : errorOrContext;
    this.log('alert', msg, actualContext, errorObj);
  }

  public emerg(
    msg: string,
    errorOrContext: Error | RequestContext,
    context?: RequestContext,
  ): void {
    const errorObj =
      errorOrContext instanceof Error ? errorOrContext : undefined;
    const actualContext =
      errorOrContext instanceof Error ? context : errorOrContext;
    this.log('emerg', msg, actualContext, errorObj);
  }

  public fatal(
    msg: string,
    errorOrContext: Error | RequestContext,
    context?: RequestContext,
  ): void {
    this.emerg(msg, errorOrContext, context);
  }
}

export const logger = Logger.getInstance();
