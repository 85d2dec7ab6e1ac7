import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
    DEBUG = 'DEBUG',
    INFO = 'INFO',
    WARN = 'WARN',
    ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    [LogLevel.DEBUG]: 10,
    [LogLevel.INFO]: 20,
    [LogLevel.WARN]: 30,
    [LogLevel.ERROR]: 40,
};

function parseLevel(raw: string | undefined): LogLevel {
    switch ((raw || '').trim().toUpperCase()) {
        case 'DEBUG':
            return LogLevel.DEBUG;
        case 'WARN':
        case 'WARNING':
            return LogLevel.WARN;
        case 'ERROR':
            return LogLevel.ERROR;
        default:
            return LogLevel.INFO;
    }
}

class Logger {
    private logFileStream: fs.WriteStream | null = null;
    private logFilePath: string = '';
    private threshold: LogLevel = parseLevel(process.env.LOG_LEVEL);

    init(logDir: string) {
        if (!fs.existsSync(logDir)) {
            fs.mkdirSync(logDir, { recursive: true });
        }

        const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
        this.logFilePath = path.join(logDir, `run-${timestamp}.log`);
        this.logFileStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });

        this.log(LogLevel.DEBUG, `Logger initialized. Log file: ${this.logFilePath}`);
    }

    isFileLogging(): boolean {
        return this.logFileStream !== null;
    }

    setLevel(level: LogLevel) {
        this.threshold = level;
    }

    private formatMessage(level: LogLevel, message: string, data?: unknown): string {
        const timestamp = new Date().toISOString();
        let logMessage = `[${timestamp}] [${level}] ${message}`;
        if (data !== undefined) {
            if (data instanceof Error) {
                logMessage += `\n${data.stack || data.message}`;
            } else {
                logMessage += ` ${JSON.stringify(data)}`;
            }
        }
        return logMessage;
    }

    private log(level: LogLevel, message: string, data?: unknown) {
        const logMessage = this.formatMessage(level, message, data);

        // The log file gets everything; the console respects LOG_LEVEL
        if (this.logFileStream) {
            this.logFileStream.write(logMessage + '\n');
        }

        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.threshold]) return;

        if (level === LogLevel.ERROR) {
            console.error(logMessage);
        } else {
            console.log(logMessage);
        }
    }

    debug(message: string, data?: unknown) {
        this.log(LogLevel.DEBUG, message, data);
    }

    info(message: string, data?: unknown) {
        this.log(LogLevel.INFO, message, data);
    }

    warn(message: string, data?: unknown) {
        this.log(LogLevel.WARN, message, data);
    }

    error(message: string, error?: unknown) {
        this.log(LogLevel.ERROR, message, error);
    }

    close() {
        if (this.logFileStream) {
            this.logFileStream.end();
            this.logFileStream = null;
        }
    }
}

export const logger = new Logger();
