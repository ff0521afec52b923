/**
 * Shared test utilities
 */

// Mock factories
export * from './mock-factories';

// Test helpers
export * from './test-helpers';
