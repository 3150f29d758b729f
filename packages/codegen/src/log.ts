export const LOG_LEVELS = ['debug', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogEvent = {
    level: LogLevel;
    message: string;
    details?: Record<string, unknown>;
    error?: unknown;
};

export type Logger = (event: LogEvent) => void;

/**
 * Either the levels to print to the console, or a function receiving every event.
 */
export type LogConfig = readonly LogLevel[] | Logger;

export class Log {
    readonly #levels: Readonly<Record<LogLevel, boolean>>;
    readonly #logger: Logger;

    constructor(config: LogConfig) {
        if (typeof config === 'function') {
            this.#levels = { debug: true, error: true };
            this.#logger = config;
        } else {
            this.#levels = { debug: config.includes('debug'), error: config.includes('error') };
            this.#logger = defaultLogger;
        }
    }

    isLevelEnabled(level: LogLevel): boolean {
        return this.#levels[level];
    }

    debug(getEvent: () => Omit<LogEvent, 'level'>) {
        if (this.#levels.debug) {
            this.#logger({ level: 'debug', ...getEvent() });
        }
    }

    error(getEvent: () => Omit<LogEvent, 'level'>) {
        if (this.#levels.error) {
            this.#logger({ level: 'error', ...getEvent() });
        }
    }
}

function defaultLogger(event: LogEvent) {
    const line = `[exprgen] ${event.message}`;
    if (event.level === 'error') {
        console.error(line, ...(event.error !== undefined ? [event.error] : []));
    } else if (event.details) {
        console.log(line, event.details);
    } else {
        console.log(line);
    }
}
