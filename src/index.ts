// ============================================================================
// @phasemint/engine — Public API Surface
// ============================================================================

// ---- Core types, constants & errors ----------------------------------------
export * from './types.js';
export * from './constants.js';
export * from './errors.js';
export * from './events.js';

// ---- Configuration & logging -----------------------------------------------
export * from './config.js';
export * from './logger.js';

// ---- Engine components -----------------------------------------------------
export * from './supplyLedger.js';
export * from './phaseRegistry.js';
export * from './allowList.js';
export * from './accessController.js';
export * from './pauseSwitch.js';
export * from './pricing.js';
export * from './journal.js';
export * from './mintExecutor.js';

// ---- Instances -------------------------------------------------------------
export * from './engine.js';
export * from './factory.js';

// ---- In-process collaborators ----------------------------------------------
export * from './clock.js';
export * from './memoryRegistry.js';
export * from './memoryFunds.js';
export { toAddress, sameAddress } from './address.js';
