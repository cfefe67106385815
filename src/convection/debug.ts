/**
 * Debug logging shared by the convection modules.
 *
 * Off by default. When enabled, messages are kept in a bounded in-memory log
 * (size from convectionConfig.debugLogLimit) that callers can dump.
 */

import { convectionConfig } from './types';

let DEBUG_CONVECTION = false;
let debugLog: string[] = [];

export function setConvectionDebug(enabled: boolean): void {
  DEBUG_CONVECTION = enabled;
  if (enabled) {
    debugLog = [];
    console.log('[Convection] Debug mode enabled');
  }
}

export function getConvectionDebugLog(): string[] {
  return [...debugLog];
}

export function logDebug(msg: string): void {
  if (DEBUG_CONVECTION) {
    debugLog.push(msg);
    const limit = Math.max(0, convectionConfig.debugLogLimit);
    while (debugLog.length > limit) {
      debugLog.shift();
    }
  }
}
