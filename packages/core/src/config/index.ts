export { loadSessionConfig, type LoadSessionConfigOptions } from './load-session-config.js';
