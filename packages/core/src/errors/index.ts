export {
  ConnectorError,
  errorMessage,
  type ErrorCode,
  type ConnectorErrorDetails,
} from './connector-error.js';
