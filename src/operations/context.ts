/**
 * Shared dependencies of the registry operations.
 * @module operations/context
 */

import type { RegistryConfig } from '../config.js';
import type { Logger } from '../observability/logging.js';
import type { RequestPipeline } from '../transport/pipeline.js';

/**
 * What every operation factory receives from the client.
 */
export interface OperationContext {
  readonly config: RegistryConfig;
  readonly pipeline: RequestPipeline;
  readonly logger: Logger;
}

/**
 * Per-call options.
 */
export interface CallOptions {
  /** Aborts the call, including a blob stream still being read */
  readonly signal?: AbortSignal;
}
