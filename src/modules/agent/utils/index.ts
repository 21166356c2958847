export { classifyConnectError, classifyHandshakeStatus, isFatalConnectError } from './error-classifier';
