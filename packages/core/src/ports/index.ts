/**
 * Ports Barrel Export
 */

export type { ClockPort } from './clockPort.js';
export { createSystemClock, createFixedClock } from './clockPort.js';
