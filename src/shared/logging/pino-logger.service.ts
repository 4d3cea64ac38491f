import { Injectable, LoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino, { Logger, LoggerOptions } from 'pino';
import { AppConfig } from '../../config/configuration';

export const SERVICE_NAME = 'document-transform-service';

type LogFields = Record<string, unknown>;

/**
 * Pino options for the service. Pretty output is only used in development;
 * everywhere else the log is one JSON object per line.
 */
export function createPinoOptions(
  config: Pick<AppConfig, 'logLevel' | 'nodeEnv'>,
): LoggerOptions {
  return {
    level: config.logLevel || 'info',
    ...(config.nodeEnv === 'development' && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname,service,env',
        },
      },
    }),
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: ['credentials', '*.credentials', 'content'],
      censor: '[redacted]',
    },
    base: {
      service: SERVICE_NAME,
      env: config.nodeEnv,
    },
  };
}

@Injectable()
export class PinoLoggerService implements LoggerService {
  private logger: Logger;
  private context?: string;

  constructor(configService: ConfigService<AppConfig>) {
    this.logger = pino(
      createPinoOptions({
        logLevel: configService.get('logLevel', { infer: true }) ?? 'info',
        nodeEnv: configService.get('nodeEnv', { infer: true }) ?? 'production',
      }),
    );
  }

  log(message: string, context?: string): void {
    this.write('info', message, context);
  }

  info(message: string): void;
  info(fields: LogFields, message: string): void;
  info(fieldsOrMessage: LogFields | string, message?: string): void {
    this.write('info', fieldsOrMessage, message);
  }

  /**
   * Field form: `error({ err, jobId }, 'message')`.
   * String form follows Nest's `(message, stack, context)` convention.
   */
  error(message: string | LogFields, trace?: string, context?: string): void {
    if (typeof message === 'object') {
      this.logger.error({ ...message, context: this.context }, trace ?? '');
      return;
    }
    this.logger.error({ trace, context: context ?? this.context }, message);
  }

  warn(message: string | LogFields, contextOrMessage?: string): void {
    this.write('warn', message, contextOrMessage);
  }

  debug(message: string | LogFields, contextOrMessage?: string): void {
    this.write('debug', message, contextOrMessage);
  }

  verbose(message: string, context?: string): void {
    this.write('trace', message, context);
  }

  /**
   * Child logger with its own context, so services sharing the root instance
   * do not overwrite each other's context.
   */
  forContext(context: string): PinoLoggerService {
    return this.child({}, context);
  }

  forJob(jobId: string): PinoLoggerService {
    return this.child({ jobId });
  }

  /** Bound to one received message for the lifetime of its handling. */
  forMessage(messageId: string, deliveryCount?: number): PinoLoggerService {
    return this.child({ messageId, deliveryCount });
  }

  private child(bindings: LogFields, context = this.context): PinoLoggerService {
    const childLogger: PinoLoggerService = Object.create(this);
    childLogger.logger = this.logger.child(bindings);
    childLogger.context = context;
    return childLogger;
  }

  /**
   * With a string first argument the second one is a Nest context;
   * with fields it is the message.
   */
  private write(
    level: 'info' | 'warn' | 'debug' | 'trace',
    fieldsOrMessage: LogFields | string,
    second?: string,
  ): void {
    if (typeof fieldsOrMessage === 'string') {
      this.logger[level]({ context: second ?? this.context }, fieldsOrMessage);
    } else {
      this.logger[level]({ ...fieldsOrMessage, context: this.context }, second ?? '');
    }
  }
}
