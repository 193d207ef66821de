/**
 * Mesh Error System
 *
 * Every failure the engine reports is a MeshError subclass with a stable code
 * (MESH_V100, MESH_D400, ...), a suggestion and a context record.
 *
 * @example
 * ```typescript
 * import { MeshError, NotFoundError } from '@recipe-mesh/engine';
 *
 * if (MeshError.isCategory(error, 'validation')) {
 *   console.log(error.format());
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  ChannelClosedError,
  ChannelError,
  ConfigError,
  DecodeError,
  EngineStoppedError,
  MeshError,
  NotFoundError,
  PersistenceError,
  ValidationError,
  ensureMeshError,
  type FieldValidationError,
  type MeshErrorOptions,
  type SerializedMeshError,
} from './mesh-error.js';
