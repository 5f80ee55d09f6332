export { SessionError, SessionErrorCode, toError } from './session-error.js';
