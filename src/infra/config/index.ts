/**
 * Config module - exports all configuration utilities
 */

export * from './loadConfig.js';
export * from './applyConfig.js';
export { envVarNameFromPath, applyConfigEnvOverrides } from './env/config-env-overrides.js';
