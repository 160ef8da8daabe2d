export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Lowest level written to the console; 'silent' writes nothing */
export type ConsoleThreshold = LogLevel | 'silent';

export interface LogEntry {
    timestamp: number;
    level: LogLevel;
    message: string;
    data?: unknown;
}

type LogListener = (entry: LogEntry) => void;

const LEVEL_RANK: Record<ConsoleThreshold, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

/**
 * Session-wide log. Entries always reach subscribers and the recent
 * history; the console only sees those at or above the threshold.
 */
class LoggerService {
    public static readonly HISTORY_LIMIT = 100;

    private listeners: LogListener[] = [];
    private history: LogEntry[] = [];
    private threshold: ConsoleThreshold = 'debug';

    public subscribe(listener: LogListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    public setConsoleThreshold(threshold: ConsoleThreshold) {
        this.threshold = threshold;
    }

    /**
     * Most recent entries, oldest first.
     */
    public getHistory(): readonly LogEntry[] {
        return this.history;
    }

    private emit(level: LogLevel, message: string, data?: unknown) {
        const entry: LogEntry = { timestamp: Date.now(), level, message, data };

        this.history = [...this.history, entry].slice(-LoggerService.HISTORY_LIMIT);

        if (LEVEL_RANK[level] >= LEVEL_RANK[this.threshold]) {
            console[level](`[${level.toUpperCase()}] ${message}`, data ?? '');
        }

        this.listeners.forEach(l => l(entry));
    }

    public debug(msg: string, data?: unknown) { this.emit('debug', msg, data); }
    public info(msg: string, data?: unknown) { this.emit('info', msg, data); }
    public warn(msg: string, data?: unknown) { this.emit('warn', msg, data); }
    public error(msg: string, data?: unknown) { this.emit('error', msg, data); }
}

export const Logger = new LoggerService();
