// =============================================================================
// CANOPY AGENT NODE
// =============================================================================
// A remote execution agent. Connects to the control plane, joins the pool of
// the supervisor that owns its capability and runs the directives it is sent.
// =============================================================================

import { randomUUID } from 'crypto';
import { log, COLORS } from './logger.js';
import { connect, closeSocket } from './connection.js';
import { getNodeSpecs, resolveWorker } from './capabilities.js';

// -----------------------------------------------------------------------------
// Startup
// -----------------------------------------------------------------------------

function main(): void {
    log('info', 'Node', '🚀 Canopy Agent Node starting...');

    const capability = process.env.NODE_CAPABILITY ?? 'text';
    const worker = resolveWorker(capability);
    const specs = getNodeSpecs();

    const NODE_ID = process.env.NODE_ID ?? `node-${randomUUID().slice(0, 8)}`;

    log('info', 'Node', `📛 Node ID: ${COLORS.magenta}${NODE_ID}${COLORS.reset}`);
    log('info', 'Node', `📦 Capability: ${capability} [${worker.catalog.actions.join(', ')}]`);
    log('info', 'Node', `💻 Specs: ${specs.cpuCores} cores, ${specs.totalMemoryGB}GB RAM, ${specs.os}/${specs.arch}`);

    connect({
        identity: { agentId: NODE_ID, capabilities: [capability], tier: 'execution' },
        worker,
    });
}

// -----------------------------------------------------------------------------
// Graceful Shutdown
// -----------------------------------------------------------------------------

process.on('SIGINT', () => {
    log('info', 'Node', '🛑 Shutting down...');
    closeSocket();
    log('info', 'Node', '👋 Goodbye!');
    process.exit(0);
});

// -----------------------------------------------------------------------------
// Start
// -----------------------------------------------------------------------------

try {
    main();
} catch (err) {
    log('error', 'Node', `Fatal error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
}
