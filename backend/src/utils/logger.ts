import chalk from 'chalk';
import fs from 'fs-extra';
import path from 'path';
import { LOG_DIR } from '../constants';

const MAX_LOG_SIZE = 10 * 1024 * 1024; // 10MB

export type LogEventAction =
    | 'SWITCH'
    | 'RESET'
    | 'RESTORE'
    | 'NOOP'
    | 'BACKUP'
    | 'BACKUP_EVICT'
    | 'LOCK_DESYNC'
    | 'BENCHMARK'
    | 'LEAK_CHECK'
    | 'FLUSH';

export interface LoggerOptions {
    dir?: string;
    console?: boolean;
}

export class Logger {
    private lastMessage: string = '';
    private repeatCount: number = 0;
    private throttleTimeout: NodeJS.Timeout | null = null;
    private readonly dir: string;
    private readonly mainLog: string;
    private readonly eventLog: string;
    private readonly toConsole: boolean;

    constructor(options: LoggerOptions = {}) {
        this.dir = options.dir ?? LOG_DIR;
        this.mainLog = path.join(this.dir, 'dnsswitch.log');
        this.eventLog = path.join(this.dir, 'events.log');
        this.toConsole = options.console ?? true;
    }

    private getTimestamp() {
        const now = new Date();
        const date = now.toLocaleDateString('en-GB');
        const time = now.toLocaleTimeString('en-GB', { hour12: false });
        return `${date} ${time}`;
    }

    private format(level: string, message: string) {
        return `[+] DNSSwitch: ${this.getTimestamp()} - ${level}: ${message}`;
    }

    private appendLine(file: string, line: string) {
        try {
            fs.ensureDirSync(this.dir);
            // Rotation Logic
            if (fs.existsSync(file)) {
                const stats = fs.statSync(file);
                if (stats.size > MAX_LOG_SIZE) {
                    const ext = path.extname(file);
                    fs.moveSync(file, path.join(this.dir, `${path.basename(file, ext)}-${Date.now()}${ext}`));
                }
            }
            fs.appendFileSync(file, line + '\n');
        } catch (e) {
            console.error('FAILED TO WRITE TO LOG FILE:', e);
        }
    }

    private print(line: string, colorFn: (s: string) => string) {
        if (this.toConsole) console.log(colorFn(line));
    }

    private flushRepeats() {
        const statusMsg = `(Previous message repeated ${this.repeatCount} times)`;
        this.print(this.format('STABILITY', statusMsg), chalk.gray);
        this.appendLine(this.mainLog, this.format('STABILITY', statusMsg));
        this.repeatCount = 0;
    }

    private logThrottled(level: string, message: string, colorFn: (s: string) => string) {
        if (message === this.lastMessage) {
            this.repeatCount++;
            if (this.throttleTimeout) clearTimeout(this.throttleTimeout);

            this.throttleTimeout = setTimeout(() => {
                if (this.repeatCount > 0) {
                    this.flushRepeats();
                    this.lastMessage = '';
                }
            }, 2000);
            this.throttleTimeout.unref();
            return;
        }

        // If we were repeating and a new message comes in, flush the repeat status
        if (this.repeatCount > 0) {
            this.flushRepeats();
        }

        this.lastMessage = message;
        const formatted = this.format(level, message);
        this.print(formatted, colorFn);
        this.appendLine(this.mainLog, formatted);
    }

    info(message: string) {
        this.logThrottled('INFO', message, chalk.white);
    }

    success(message: string) {
        this.logThrottled('SUCCESS', message, chalk.green);
    }

    warn(message: string) {
        this.logThrottled('WARNING', message, chalk.yellow);
    }

    error(message: string) {
        this.logThrottled('ERROR', message, chalk.red);
    }

    debug(message: string) {
        if (process.env.NODE_ENV === 'development' || process.env.VERBOSE === 'true') {
            this.logThrottled('DEBUG', message, chalk.gray);
        }
    }

    /**
     * Structured, append-only record. One line per event:
     * `<ISO timestamp> | <ACTION> | <JSON fields>`
     */
    event(action: LogEventAction, fields: Record<string, unknown>) {
        this.appendLine(this.eventLog, `${new Date().toISOString()} | ${action} | ${JSON.stringify(fields)}`);
    }

    raw(message: string) {
        console.log(message);
        this.appendLine(this.mainLog, message);
    }
}

export const logger = new Logger();
