// =============================================================================
// CANOPY PROTOCOL
// =============================================================================
// Envelope contract, bridge frames, errors, and action catalogs shared by the
// control plane and remote agent nodes.
// =============================================================================

// Messages
export * from './messages.js';

// Types
export * from './types.js';

// Errors
export * from './errors.js';

// Action catalogs
export * from './actions.js';

// Wire schemas
export * from './schema.js';

// Utilities
export * from './utils.js';

// Transport
export * from './channel.js';
export * from './socket-channel.js';
