import { type LogLevel, type Logger } from '@glimpse/core';
import pino, { type DestinationStream, type Logger as PinoInstance } from 'pino';

/** Fields that may carry an API key, bearer token or vendor secret. */
export const REDACTED_LOG_PATHS = [
    'apiKey',
    'credential',
    'token',
    'authorization',
    '*.apiKey',
    '*.credential',
    'headers.authorization',
    'customConfig.apiKey'
];

export interface PinoLoggerOptions {
    level?: LogLevel;
    prettyPrint?: boolean;
    name?: string;
    /** Fields bound to every line, such as the gateway version. */
    bindings?: Record<string, unknown>;
    /** Defaults to stdout; ignored when `prettyPrint` is set. */
    destination?: DestinationStream;
}

type LogArg = Record<string, unknown> | string;

/** `Logger` port over pino, with JSON lines in production and pino-pretty in development. */
export class PinoLogger implements Logger {
    private readonly pino: PinoInstance;

    constructor(options: PinoLoggerOptions = {}, instance?: PinoInstance) {
        this.pino = instance ?? PinoLogger.createInstance(options);
    }

    private static createInstance(options: PinoLoggerOptions): PinoInstance {
        const { level = 'info', prettyPrint = false, name, bindings, destination } = options;

        const pinoOptions: pino.LoggerOptions = {
            level,
            redact: { paths: REDACTED_LOG_PATHS, censor: '[redacted]' },
            timestamp: pino.stdTimeFunctions.isoTime
        };

        if (name) {
            pinoOptions.name = name;
        }
        if (bindings) {
            pinoOptions.base = { pid: process.pid, ...bindings };
        }

        if (prettyPrint) {
            pinoOptions.transport = {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:HH:MM:ss.l',
                    ignore: 'pid,hostname'
                }
            };
            return pino(pinoOptions);
        }

        return destination ? pino(pinoOptions, destination) : pino(pinoOptions);
    }

    public trace(arg: LogArg, msg?: string): void {
        this.write('trace', arg, msg);
    }

    public debug(arg: LogArg, msg?: string): void {
        this.write('debug', arg, msg);
    }

    public info(arg: LogArg, msg?: string): void {
        this.write('info', arg, msg);
    }

    public warn(arg: LogArg, msg?: string): void {
        this.write('warn', arg, msg);
    }

    public error(arg: LogArg, msg?: string): void {
        this.write('error', arg, msg);
    }

    public fatal(arg: LogArg, msg?: string): void {
        this.write('fatal', arg, msg);
    }

    public child(bindings: Record<string, unknown>): Logger {
        return new PinoLogger({}, this.pino.child(bindings));
    }

    private write(level: LogLevel, arg: LogArg, msg?: string): void {
        if (typeof arg === 'string') {
            this.pino[level](arg);
        } else {
            this.pino[level](arg, msg);
        }
    }
}
