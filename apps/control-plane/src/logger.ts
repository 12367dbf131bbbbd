import { config } from '@canopy/config';
import type { DeadLetterReason, LifecycleState } from '@canopy/protocol';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const COLORS = {
    reset: '\x1b[0m',
    dim: '\x1b[2m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    red: '\x1b[31m',
    cyan: '\x1b[36m',
    magenta: '\x1b[35m',
};

const LEVEL_COLORS: Record<LogLevel, string> = {
    debug: COLORS.dim,
    info: COLORS.green,
    warn: COLORS.yellow,
    error: COLORS.red,
};

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_PRIORITY;
}

class Logger {
    private minLevel: number;

    constructor(level: string) {
        this.minLevel = isLogLevel(level) ? LEVEL_PRIORITY[level] : LEVEL_PRIORITY.info;
    }

    private format(level: LogLevel, tag: string, message: string): string {
        const timestamp = config.logging.timestamps
            ? `${COLORS.dim}${new Date().toISOString()}${COLORS.reset} `
            : '';
        const levelStr = `${LEVEL_COLORS[level]}[${level.toUpperCase()}]${COLORS.reset}`;
        const tagStr = `${COLORS.cyan}[${tag}]${COLORS.reset}`;
        return `${timestamp}${levelStr} ${tagStr} ${message}`;
    }

    private log(level: LogLevel, tag: string, message: string): void {
        if (LEVEL_PRIORITY[level] >= this.minLevel) {
            console.log(this.format(level, tag, message));
        }
    }

    debug(tag: string, message: string): void {
        this.log('debug', tag, message);
    }

    info(tag: string, message: string): void {
        this.log('info', tag, message);
    }

    warn(tag: string, message: string): void {
        this.log('warn', tag, message);
    }

    error(tag: string, message: string): void {
        this.log('error', tag, message);
    }

    // Convenience methods for common events
    lifecycle(agentId: string, from: LifecycleState, to: LifecycleState): void {
        const emoji = to === 'RUNNING' ? '✅' : to === 'DEGRADED' ? '⚠️' : to === 'STOPPED' ? '🛑' : '🔄';
        const level: LogLevel = to === 'DEGRADED' ? 'warn' : 'debug';
        this.log(level, 'Lifecycle', `${emoji} ${COLORS.magenta}${agentId}${COLORS.reset} ${from} → ${to}`);
    }

    deadLetter(envelopeId: string, recipientId: string, reason: DeadLetterReason): void {
        this.warn('DeadLetter', `💀 ${envelopeId} for ${COLORS.magenta}${recipientId}${COLORS.reset}: ${reason}`);
    }
}

export const logger = new Logger(config.logging.level);
