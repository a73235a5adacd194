import winston from "winston";

export enum LoggerLevel {
    TRACE = 'silly',
    DEBUG = 'debug',
    INFO = 'info',
    WARN = 'warn',
    ERROR = 'error',
}

/**
 * Formats an entry as `<timestamp> (<LEVEL>@<label>) - <message>`.
 */
export const loggerFormat = (label: string): ReturnType<typeof winston.format.combine> => winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf((info): string =>
        `${String(info.timestamp)} (${info.level.toUpperCase()}@${label}) - ${String(info.message)}`),
);

/**
 * Creates the console logger the clients expect.
 * @param label the label shown in each line.
 * @param level the lowest level written.
 */
export function createLogger(label: string, level: LoggerLevel = LoggerLevel.INFO): winston.Logger {
    return winston.createLogger({
        level,
        format: loggerFormat(label),
        transports: [ new winston.transports.Console() ],
    });
}
