/**
 * armature - Logging Module
 */

export { consoleLogger, silentLogger } from './ILogger';
export type { ILogger } from './ILogger';
