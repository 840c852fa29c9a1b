// SPDX-License-Identifier: Apache-2.0

import * as winston from 'winston';
import {v4 as uuidv4} from 'uuid';
import * as util from 'node:util';
import path from 'node:path';
import * as constants from '../constants.js';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type HostingLogger} from './hosting-logger.js';

type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type WinstonTransport = Parameters<winston.Logger['add']>[0];

const customFormat = winston.format.combine(
  winston.format.splat(),

  // include timestamp in logs
  winston.format.timestamp(),

  // convert levels to upper case
  winston.format(data => {
    data.level = data.level.toUpperCase();
    return data;
  })(),

  // use custom format TIMESTAMP|LEVEL| [RESOURCE] MESSAGE
  winston.format.printf(
    data => `${data.timestamp}|${data.level}| ${data.resource ? `[${data.resource}] ` : ''}${data.message}`,
  ),

  // Ignore log messages if they have { private: true }
  winston.format(data => (data.private ? false : data))(),
);

abstract class AbstractWinstonLogger implements HostingLogger {
  protected abstract readonly winstonLogger: winston.Logger;
  protected abstract readonly developmentMode: boolean;
  private traceId?: string;

  protected constructor() {
    this.nextTraceId();
  }

  public nextTraceId(): void {
    this.traceId = uuidv4();
  }

  public prepMeta(meta: Record<string, unknown> = {}): Record<string, unknown> {
    meta.traceId = this.traceId;
    return meta;
  }

  public error(message: unknown, ...arguments_: unknown[]): void {
    this.toWinston('error', message, arguments_);
  }

  public warn(message: unknown, ...arguments_: unknown[]): void {
    this.toWinston('warn', message, arguments_);
  }

  public info(message: unknown, ...arguments_: unknown[]): void {
    this.toWinston('info', message, arguments_);
  }

  public debug(message: unknown, ...arguments_: unknown[]): void {
    this.toWinston('debug', message, arguments_);
  }

  public child(meta: Record<string, string>): HostingLogger {
    return new WinstonChildLogger(this.winstonLogger.child(meta), this.developmentMode);
  }

  private toWinston(level: LogLevel, message: unknown, arguments_: unknown[]): void {
    const meta: Record<string, unknown> = this.prepMeta({});

    if (message instanceof Error) {
      this.winstonLogger.log(level, this.describe(message), meta);
      return;
    }

    // errors passed after the message are attached as the cause rather than formatted inline
    const errors: Error[] = arguments_.filter((argument: unknown): argument is Error => argument instanceof Error);
    const rest: unknown[] = arguments_.filter((argument: unknown): boolean => !(argument instanceof Error));
    if (errors.length > 0) {
      meta.cause = errors.map((error: Error): string => this.describe(error)).join('\n');
    }

    const formatted: string = util.format(message, ...rest);
    this.winstonLogger.log(level, errors.length > 0 ? `${formatted}: ${meta.cause}` : formatted, meta);
  }

  private describe(error: Error): string {
    return this.developmentMode && error.stack ? error.stack : error.message;
  }
}

class WinstonChildLogger extends AbstractWinstonLogger {
  public constructor(
    protected readonly winstonLogger: winston.Logger,
    protected readonly developmentMode: boolean,
  ) {
    super();
  }
}

@injectable()
export class WinstonHostingLogger extends AbstractWinstonLogger {
  protected readonly winstonLogger: winston.Logger;
  protected readonly developmentMode: boolean;

  /**
   * @param logLevel - the log level to use, or `silent` to discard everything
   * @param developmentMode - if true, include stack traces of logged errors
   */
  public constructor(
    @inject(InjectTokens.LogLevel) logLevel?: string,
    @inject(InjectTokens.DevelopmentMode) developmentMode?: boolean,
  ) {
    super();
    const level: string = patchInject(logLevel, InjectTokens.LogLevel, this.constructor.name);
    this.developmentMode = patchInject(developmentMode, InjectTokens.DevelopmentMode, this.constructor.name);

    const silent: boolean = level === 'silent';
    this.winstonLogger = winston.createLogger({
      level: silent ? 'error' : level,
      silent,
      format: customFormat,
      transports: [new winston.transports.Console()],
    });

    if (constants.HOSTING_LOGS_DIR) {
      this.addTransport(new winston.transports.File({filename: path.join(constants.HOSTING_LOGS_DIR, 'hosting.log')}));
    }
  }

  public addTransport(transport: WinstonTransport): void {
    this.winstonLogger.add(transport);
  }
}
