import pino from 'pino';

export type LogFields = Record<string, unknown>;

export interface ILogger {
    debug: (fields: LogFields, msg: string) => void;
    info: (fields: LogFields, msg: string) => void;
    warn: (fields: LogFields, msg: string) => void;
    error: (fields: LogFields, msg: string) => void;
}

export const makeLogger = (level: pino.LevelWithSilent = 'warn', name = 'rollback'): ILogger => {
    const base = pino({ name, level });
    return {
        debug: (fields, msg) => base.debug(fields, msg),
        info: (fields, msg) => base.info(fields, msg),
        warn: (fields, msg) => base.warn(fields, msg),
        error: (fields, msg) => base.error(fields, msg),
    };
};

const LEVELS: readonly pino.LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

const isLevel = (value: string | undefined): value is pino.LevelWithSilent =>
    LEVELS.some(level => level === value);

/** Level for the package logger, from ROLLBACK_LOG_LEVEL (default warn) */
export const envLogLevel = (value: string | undefined = process.env.ROLLBACK_LOG_LEVEL): pino.LevelWithSilent =>
    isLevel(value) ? value : 'warn';

export const logger: ILogger = makeLogger(envLogLevel());
