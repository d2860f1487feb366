/**
 * @questwire/core
 *
 * Core package exports: SPI interfaces, errors, logger, client profile, session state
 * machine, envelope signing, operation catalog, result sinks.
 */

// SPI interfaces
export * from './spi/index.js';

// Client profile
export * from './config/index.js';

// Session
export * from './session/location.js';
export * from './session/state.js';
export * from './session/status.js';
export * from './session/envelope.js';
export * from './session/session.js';

// Operation catalog
export * from './operations/catalog.js';

// Result sinks
export * from './sink/buffer.js';

// Utilities
export * from './utils/errors.js';
export * from './utils/logger.js';
