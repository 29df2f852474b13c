/**
 * @kubemend/shared
 * Configuration, logging and errors shared by every kubemend package
 */

export * from './config/index.js';
export * from './logger/index.js';
export * from './errors/index.js';
