// =============================================================================
// CANOPY CONTROL PLANE
// =============================================================================
// Runs the agent hierarchy in one process and accepts remote agents over the
// bridge. Local pools come from the built-in workers.
// =============================================================================

import { config as dotenvConfig } from 'dotenv';
import { join } from 'path';

// Load .env from the repository root (../../.env relative to apps/control-plane)
dotenvConfig({ path: join(process.cwd(), '../../.env') });

import { config } from '@canopy/config';
import { createTextWorker, mathWorker, textWorker } from '@canopy/workers';
import { startBridgeServer, stopBridgeServer } from './bridge/ws-server.js';
import { logger } from './logger.js';
import { createSystem } from './system.js';

const system = createSystem({
    coordinator: {
        coordinatorId: 'coordinator',
        alternates: { text: 'text-backup' },
    },
    supervisors: [
        {
            supervisorId: 'text-supervisor',
            pools: [
                { capability: 'text', size: config.supervisor.poolSize, worker: textWorker },
                { capability: 'text-backup', size: 1, worker: createTextWorker('text-backup') },
            ],
        },
        {
            supervisorId: 'math-supervisor',
            pools: [
                { capability: 'math', size: config.supervisor.poolSize, worker: mathWorker },
            ],
        },
    ],
});

const bridge = system.createBridge();

await system.start();
const wss = startBridgeServer(bridge, config.controlPlane.port);

// -----------------------------------------------------------------------------
// Graceful Shutdown
// -----------------------------------------------------------------------------

let shuttingDown = false;

process.on('SIGINT', () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Control Plane', '🛑 Shutting down...');
    clearInterval(statsTimer);

    bridge.close()
        .then(() => stopBridgeServer(wss))
        .then(() => system.shutdown())
        .then(() => {
            logger.info('Control Plane', '👋 Goodbye!');
            process.exit(0);
        })
        .catch((err: unknown) => {
            logger.error('Control Plane', `Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
            process.exit(1);
        });
});

// Log stats periodically
const statsTimer = setInterval(() => {
    const stats = system.getStats();
    const remote = bridge.connected().length;
    logger.info(
        'Stats',
        `📊 Agents: ${stats.health.agents.online}/${stats.agents.total} online, ` +
        `${stats.health.agents.degraded} degraded, ${remote} remote, ` +
        `${stats.inFlight} goals in flight, ${stats.deadLetters.total} dead letters`,
    );
}, 30000);
