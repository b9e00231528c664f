/**
 * Run logger
 * Echoes every line to the console and appends it, timestamped and
 * categorised, to a daily log file: logs/transcribe-YYYY-MM-DD.log
 */

import * as fs from 'fs';
import * as path from 'path';

export interface Logger {
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    /** Derive a logger that tags its lines with another category */
    child(category: string): Logger;
}

type Level = 'INFO' | 'WARN' | 'ERROR';

interface LogSink {
    write(line: string): void;
}

function getDateString(now: Date = new Date()): string {
    return now.toISOString().split('T')[0];
}

/**
 * Logger that writes to both console and a daily file
 */
export class FileLogger implements Logger {
    private readonly sink: LogSink;
    private readonly category: string;
    private readonly stream: fs.WriteStream | null;

    constructor(logDir: string, category = 'transcribe', sink?: LogSink) {
        this.category = category;
        if (sink) {
            this.sink = sink;
            this.stream = null;
            return;
        }

        fs.mkdirSync(logDir, { recursive: true });
        const logPath = path.join(logDir, `transcribe-${getDateString()}.log`);
        const stream = fs.createWriteStream(logPath, { flags: 'a' });
        stream.write(`\n${'='.repeat(60)}\n[${new Date().toISOString()}] ${process.argv.slice(1).join(' ')}\n${'='.repeat(60)}\n`);
        this.stream = stream;
        this.sink = stream;
    }

    info(message: string): void {
        console.log(message);
        this.append('INFO', message);
    }

    warn(message: string): void {
        console.warn(`⚠️ ${message}`);
        this.append('WARN', message);
    }

    error(message: string): void {
        console.error(`❌ ${message}`);
        this.append('ERROR', message);
    }

    child(category: string): Logger {
        return new FileLogger('', category, this.sink);
    }

    async close(): Promise<void> {
        const stream = this.stream;
        if (!stream) return;
        await new Promise<void>((resolve) => {
            stream.end(() => resolve());
        });
    }

    private append(level: Level, message: string): void {
        this.sink.write(`${new Date().toISOString()} [${this.category}] ${level} ${message}\n`);
    }
}

/**
 * Logger that drops everything (tests, library use)
 */
export const silentLogger: Logger = {
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
    child: () => silentLogger,
};
