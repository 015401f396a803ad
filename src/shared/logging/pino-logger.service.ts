import { Injectable, LoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino, { Logger } from 'pino';
import { AppConfig } from '../../config/configuration';

type LogFields = Record<string, unknown>;

function isFields(value: unknown): value is LogFields {
  return typeof value === 'object' && value !== null && !(value instanceof Error);
}

@Injectable()
export class PinoLoggerService implements LoggerService {
  private logger: Logger;
  private context?: string;

  constructor(private readonly configService: ConfigService<AppConfig>) {
    const logLevel = this.configService.get('logLevel', { infer: true }) || 'info';
    const nodeEnv = this.configService.get('nodeEnv', { infer: true });

    this.logger = pino({
      level: logLevel,
      ...(nodeEnv === 'development' && {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
      }),
      formatters: {
        level: (label) => ({ level: label }),
      },
      base: {
        service: 'document-export-service',
        env: nodeEnv,
      },
    });
  }

  /**
   * Logger bound to a context name; the shared instance is left untouched.
   */
  forContext(context: string): PinoLoggerService {
    const scoped: PinoLoggerService = Object.create(this);
    scoped.context = context;
    return scoped;
  }

  /**
   * Entry point for Nest's `Logger`: `log(message, ...params, context)`.
   * Object params are merged into the log line, a trailing string is the context.
   */
  log(message: unknown, ...optionalParams: unknown[]): void {
    this.logger.info(...this.fromNest(message, optionalParams));
  }

  info(message: string): void;
  info(obj: LogFields, message: string): void;
  info(objOrMessage: LogFields | string, message?: string): void {
    if (typeof objOrMessage === 'string') {
      this.logger.info({ context: this.context }, objOrMessage);
    } else {
      this.logger.info({ ...objOrMessage, context: this.context }, message || '');
    }
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    this.logger.error(...this.fromNest(message, optionalParams));
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.logger.warn(...this.fromNest(message, optionalParams));
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.logger.debug(...this.fromNest(message, optionalParams));
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.logger.trace(...this.fromNest(message, optionalParams));
  }

  child(bindings: LogFields): PinoLoggerService {
    const childLogger: PinoLoggerService = Object.create(this);
    childLogger.logger = this.logger.child(bindings);
    return childLogger;
  }

  withJobId(jobId: string): PinoLoggerService {
    return this.child({ jobId });
  }

  /**
   * Accepts both call shapes in use here: `(fields, msg)` from services and
   * `(msg, ...params, context)` from Nest's Logger.
   */
  private fromNest(message: unknown, params: unknown[]): [LogFields, string] {
    const fields: LogFields = { context: this.context };
    const rest = [...params];

    if (isFields(message)) {
      const msg = typeof rest[0] === 'string' ? String(rest.shift()) : '';
      return [{ ...fields, ...message }, msg];
    }

    if (rest.length > 0 && typeof rest[rest.length - 1] === 'string') {
      fields.context = rest.pop();
    }
    for (const param of rest) {
      if (param instanceof Error) {
        fields.err = param;
      } else if (isFields(param)) {
        Object.assign(fields, param);
      } else if (param !== undefined) {
        fields.detail = param;
      }
    }
    if (message instanceof Error) {
      fields.err = message;
      return [fields, message.message];
    }
    return [fields, String(message)];
  }
}
