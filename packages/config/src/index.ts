// =============================================================================
// CANOPY CONFIG - Shared Configuration
// =============================================================================

function intFromEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = parseInt(raw, 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

function floatFromEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = parseFloat(raw);
    return Number.isNaN(parsed) ? fallback : parsed;
}

export const config = {
    // Network (remote bridge)
    controlPlane: {
        host: process.env.CONTROL_PLANE_HOST ?? 'localhost',
        port: intFromEnv('CONTROL_PLANE_PORT', 8080),
        get wsUrl() {
            return `ws://${this.host}:${this.port}`;
        },
    },

    // Message bus
    bus: {
        mailboxCapacity: intFromEnv('MAILBOX_CAPACITY', 1000),   // Envelopes per agent before MAILBOX_FULL
        deadLetterCapacity: intFromEnv('DEAD_LETTER_CAPACITY', 5000),
    },

    // Timing
    timing: {
        heartbeatInterval: 5000,       // How often agents refresh their heartbeat (ms)
        staleAfter: intFromEnv('STALE_AFTER_MS', 15000),          // Heartbeat age before agent-unhealthy (ms)
        healthCheckInterval: 5000,     // Health monitor tick (ms)
        summaryWindow: intFromEnv('SUMMARY_WINDOW_MS', 10000),    // Supervisor aggregation window (ms)
        supervisorSilence: intFromEnv('SUPERVISOR_SILENCE_MS', 30000), // Silence before system-alert (ms)
        healthSweepInterval: 10000,    // Coordinator sweep tick (ms)
        authTimeout: 10000,            // Max time to receive AUTH after connection (ms)
        reconnectBaseDelay: 1000,      // Initial reconnect delay (ms)
        reconnectMaxDelay: 30000,      // Maximum reconnect delay (ms)
        reconnectMultiplier: 2,        // Exponential backoff multiplier
        gatewayTimeout: intFromEnv('GATEWAY_TIMEOUT_MS', 60000),
    },

    // Tactical supervision
    supervisor: {
        poolSize: intFromEnv('POOL_SIZE', 2),
        maxPoolSize: 16,
        maxQueueDepth: intFromEnv('POOL_QUEUE_DEPTH', 100),
        summaryEvery: intFromEnv('SUMMARY_EVERY', 20),      // Outcomes per SUMMARY report
        retry: {
            maxRetries: intFromEnv('MAX_RETRIES', 3),
            baseDelay: 500,            // First retry delay (ms)
            maxDelay: 10000,           // Backoff cap (ms)
        },
        breaker: {
            failureThreshold: intFromEnv('BREAKER_THRESHOLD', 3),
            openTimeout: intFromEnv('BREAKER_OPEN_MS', 30000),
        },
    },

    // Strategic coordination
    coordinator: {
        minSuccessRate: floatFromEnv('MIN_SUCCESS_RATE', 0.8),
        maxAvgLatencyMs: intFromEnv('MAX_AVG_LATENCY_MS', 5000),
        maxQueueDepth: intFromEnv('MAX_QUEUE_DEPTH', 50),
        minSamples: 5,
    },

    // Bridge authentication
    auth: {
        nodeSecret: process.env.NODE_SECRET ?? 'canopy-dev-secret',
    },

    // Logging
    logging: {
        level: process.env.LOG_LEVEL ?? 'info',
        timestamps: true,
    },
} as const;

export type Config = typeof config;
