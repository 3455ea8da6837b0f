import winston from 'winston';

/** JSON.stringify cannot encode bigint, and every amount in this project is one. */
const bigintReplacer = (_key: string, value: unknown): unknown =>
    typeof value === 'bigint' ? value.toString() : value;

export const createLogger = (level: string = 'info', label?: string): winston.Logger => {
    return winston.createLogger({
        level,
        format: winston.format.combine(
            winston.format.label({ label: label || 'launchpad' }),
            winston.format.timestamp(),
            winston.format.printf(({ timestamp, level, label, message, ...meta }) =>
                `${timestamp} [${label}] ${level}: ${message} ${Object.keys(meta).length ? JSON.stringify(meta, bigintReplacer) : ''}`
            )
        ),
        transports: [new winston.transports.Console()],
    });
};
