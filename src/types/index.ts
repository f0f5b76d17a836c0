/**
 * Engine Type Definitions
 *
 * Core data models for the catalog, sync and playback.
 */

export * from './library.js';
export * from './playback.js';
export * from './sync.js';
