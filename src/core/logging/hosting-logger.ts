// SPDX-License-Identifier: Apache-2.0

export interface HostingLogger {
  /**
   * Generates a new trace id, attached to every message logged afterwards.
   */
  nextTraceId(): void;

  /**
   * Adds the current trace id to the given metadata.
   */
  prepMeta(meta?: Record<string, unknown>): Record<string, unknown>;

  error(message: unknown, ...arguments_: unknown[]): void;

  warn(message: unknown, ...arguments_: unknown[]): void;

  info(message: unknown, ...arguments_: unknown[]): void;

  debug(message: unknown, ...arguments_: unknown[]): void;

  /**
   * Creates a logger that adds the given metadata to every message, sharing this logger's transports.
   */
  child(meta: Record<string, string>): HostingLogger;
}
