// =============================================================================
// CANOPY AGENT NODE - Logger
// =============================================================================

import { config } from '@canopy/config';

export const COLORS = {
    reset: '\x1b[0m',
    dim: '\x1b[2m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    red: '\x1b[31m',
    cyan: '\x1b[36m',
    magenta: '\x1b[35m',
    blue: '\x1b[34m',
    gray: '\x1b[90m',
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string): value is LogLevel {
    return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

const minLevel = isLogLevel(config.logging.level) ? PRIORITY[config.logging.level] : PRIORITY.info;

export function log(level: LogLevel, tag: string, message: string): void {
    if (PRIORITY[level] < minLevel) return;
    const colors = { debug: COLORS.gray, info: COLORS.green, warn: COLORS.yellow, error: COLORS.red };
    const timestamp = `${COLORS.dim}${new Date().toISOString()}${COLORS.reset}`;
    const levelStr = `${colors[level]}[${level.toUpperCase()}]${COLORS.reset}`;
    const tagStr = `${COLORS.cyan}[${tag}]${COLORS.reset}`;
    console.log(`${timestamp} ${levelStr} ${tagStr} ${message}`);
}
