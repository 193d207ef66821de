/**
 * Mesh Error Codes
 *
 * Error codes are structured as MESH_[CATEGORY][NUMBER]:
 * - V: Validation errors (V100-V199)
 * - S: Storage errors (S300-S399)
 * - D: Record errors (D400-D499)
 * - C: Channel/Sync errors (C500-C599)
 * - F: Configuration errors (F600-F699)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Validation errors (V100-V199)
  MESH_V100: {
    code: 'MESH_V100',
    message: 'Validation failed',
    suggestion: 'Check the validation errors for specific field issues.',
  },

  // Storage errors (S300-S399)
  MESH_S300: {
    code: 'MESH_S300',
    message: 'Failed to persist the record store',
    suggestion:
      'Check that the storage directory exists and is writable. The previous file content is left in place.',
  },
  MESH_S301: {
    code: 'MESH_S301',
    message: 'Failed to load the record store',
    suggestion: 'The storage file is unreadable or is not a JSON array of records.',
  },

  // Record errors (D400-D499)
  MESH_D400: {
    code: 'MESH_D400',
    message: 'Record not found',
    suggestion: 'Only records created on this node can be published. Use "ls r" to list them.',
  },

  // Channel/Sync errors (C500-C599)
  MESH_C500: {
    code: 'MESH_C500',
    message: 'Malformed message payload',
    suggestion: 'The sending peer may run an incompatible version.',
  },
  MESH_C501: {
    code: 'MESH_C501',
    message: 'Message payload too large',
    suggestion: 'Raise maxPayloadBytes on every node if larger announces are expected.',
  },
  MESH_C502: {
    code: 'MESH_C502',
    message: 'Gossip channel closed',
    suggestion: 'The transport stopped delivering messages. Restart the node to rejoin the mesh.',
  },
  MESH_C503: {
    code: 'MESH_C503',
    message: 'Failed to publish to the gossip channel',
    suggestion: 'Check the transport connection state.',
  },
  MESH_C504: {
    code: 'MESH_C504',
    message: 'Sync engine is not running',
    suggestion: 'The node is shutting down or has stopped.',
  },

  // Configuration errors (F600-F699)
  MESH_F600: {
    code: 'MESH_F600',
    message: 'Invalid node configuration',
    suggestion: 'Check the command line flags and environment variables.',
  },

  // Internal errors (X900-X999)
  MESH_X900: {
    code: 'MESH_X900',
    message: 'Internal error',
    suggestion: 'An unexpected error occurred. Please report this issue.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'validation' | 'storage' | 'record' | 'connection' | 'config' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(5);
  switch (letter) {
    case 'V':
      return 'validation';
    case 'S':
      return 'storage';
    case 'D':
      return 'record';
    case 'C':
      return 'connection';
    case 'F':
      return 'config';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
