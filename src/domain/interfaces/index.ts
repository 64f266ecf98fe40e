/**
 * Domain interfaces (ports) - exports all interfaces
 */

export * from './IResourceRepository';
export * from './ILogger';
