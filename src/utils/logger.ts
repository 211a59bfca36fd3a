/**
 * Logging for Dired Preview
 *
 * Provides structured logging with:
 * - Log levels (DEBUG, INFO, WARN, ERROR)
 * - VS Code output channel for real-time viewing
 * - Module-scoped loggers
 */

import * as vscode from 'vscode';

/**
 * Log levels in order of severity
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3
}

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
    'debug': LogLevel.DEBUG,
    'info': LogLevel.INFO,
    'warn': LogLevel.WARN,
    'error': LogLevel.ERROR
};

class LoggingService {
    private outputChannel: vscode.OutputChannel | null = null;
    private configuredLevel: LogLevel = LogLevel.INFO;

    /**
     * Must be called during extension activation; until then only the console is used
     */
    initialize(context: vscode.ExtensionContext): void {
        this.outputChannel = vscode.window.createOutputChannel('Dired Preview', { log: true });
        context.subscriptions.push(this.outputChannel);

        this.loadConfiguration();
        context.subscriptions.push(
            vscode.workspace.onDidChangeConfiguration(e => {
                if (e.affectsConfiguration('diredPreview.logLevel')) {
                    this.loadConfiguration();
                }
            })
        );

        this.log(LogLevel.INFO, 'Logger', 'Logging service initialized');
    }

    private loadConfiguration(): void {
        const config = vscode.workspace.getConfiguration('diredPreview');
        const levelStr = config.get<string>('logLevel', 'info').toLowerCase();
        this.setLevel(LOG_LEVEL_MAP[levelStr] ?? LogLevel.INFO);
    }

    setLevel(level: LogLevel): void {
        this.configuredLevel = level;
    }

    shouldLog(level: LogLevel): boolean {
        // Errors are always logged regardless of configured level
        if (level === LogLevel.ERROR) {
            return true;
        }
        return level >= this.configuredLevel;
    }

    formatMessage(level: LogLevel, module: string, message: string, data?: object): string {
        const timestamp = new Date().toISOString();
        const levelStr = LogLevel[level].padEnd(5);
        const dataStr = data ? ` ${JSON.stringify(data)}` : '';
        return `[${timestamp}] [${levelStr}] [${module}] ${message}${dataStr}`;
    }

    log(level: LogLevel, module: string, message: string, data?: object): void {
        if (!this.shouldLog(level)) {
            return;
        }

        const formatted = this.formatMessage(level, module, message, data);
        this.outputChannel?.appendLine(formatted);

        switch (level) {
            case LogLevel.DEBUG:
                console.debug(formatted);
                break;
            case LogLevel.INFO:
                console.log(formatted);
                break;
            case LogLevel.WARN:
                console.warn(formatted);
                break;
            case LogLevel.ERROR:
                console.error(formatted);
                break;
        }
    }

    logError(module: string, message: string, error?: Error, data?: object): void {
        const details = error ? { ...data, error: error.message } : data;
        this.log(LogLevel.ERROR, module, message, details);

        if (error?.stack) {
            this.outputChannel?.appendLine(`  Stack: ${error.stack}`);
        }
    }

    show(): void {
        this.outputChannel?.show();
    }
}

const loggingService = new LoggingService();

export function initializeLogging(context: vscode.ExtensionContext): void {
    loggingService.initialize(context);
}

export function getLoggingService(): LoggingService {
    return loggingService;
}

/**
 * Module-scoped logger
 */
export class Logger {
    constructor(private module: string) {}

    debug(message: string, data?: object): void {
        loggingService.log(LogLevel.DEBUG, this.module, message, data);
    }

    info(message: string, data?: object): void {
        loggingService.log(LogLevel.INFO, this.module, message, data);
    }

    warn(message: string, data?: object): void {
        loggingService.log(LogLevel.WARN, this.module, message, data);
    }

    /**
     * Errors are logged at every level, with their stack trace
     */
    error(message: string, error?: Error, data?: object): void {
        loggingService.logError(this.module, message, error, data);
    }

    child(subModule: string): Logger {
        return new Logger(`${this.module}:${subModule}`);
    }
}

export function createLogger(module: string): Logger {
    return new Logger(module);
}
