/**
 * Shared types index - barrel export
 */

export * from './ai';
export * from './chat';
export * from './settings';
