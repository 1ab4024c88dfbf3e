// Shared types for the region failover controller

export * from './common';
export * from './fleet';
export * from './failover';
export * from './events';
