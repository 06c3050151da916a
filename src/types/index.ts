/**
 * Type Definitions
 *
 * Central export point for the domain types shared by every module.
 */

export * from './entities';
