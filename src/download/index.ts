/**
 * Download System - Main Entry Point
 * Exports all components of the fetch pipeline
 */

// Core components
export * from './core';

// Providers
export * from './providers';

// Security
export * from './security';
