/**
 * System Module
 *
 * Configuration, scheduling and notifications for the radar.
 */

export * from './config';
export * from './scheduler';
export * from './notification';
