import type { LinearScanError } from "#errors";

export enum Severity {
  Error = "error",
  Warning = "warning",
}

/**
 * Messages produced while running a pass, grouped by severity
 */
export type Messages<E extends LinearScanError = LinearScanError> = {
  [S in Severity]?: E[];
};

/**
 * Outcome of a pass: a value plus any messages, or only messages when
 * the pass failed. There is no partial success.
 */
export type Result<T, E extends LinearScanError = LinearScanError> =
  | { success: true; value: T; messages: Messages<E> }
  | { success: false; messages: Messages<E> };

export const Result = {
  ok<T, E extends LinearScanError = never>(value: T): Result<T, E> {
    return { success: true, value, messages: {} };
  },

  okWith<T, E extends LinearScanError>(
    value: T,
    messages: Messages<E>,
  ): Result<T, E> {
    return { success: true, value, messages };
  },

  err<T, E extends LinearScanError>(error: E | E[]): Result<T, E> {
    const errors = Array.isArray(error) ? error : [error];
    return { success: false, messages: { [Severity.Error]: errors } };
  },

  map<T, U, E extends LinearScanError>(
    result: Result<T, E>,
    fn: (value: T) => U,
  ): Result<U, E> {
    if (!result.success) {
      return result;
    }
    return { success: true, value: fn(result.value), messages: result.messages };
  },

  /**
   * Combine the messages of several results, preserving order
   */
  mergeMessages<E extends LinearScanError>(
    ...all: Messages<E>[]
  ): Messages<E> {
    const merged: Messages<E> = {};
    for (const messages of all) {
      for (const severity of [Severity.Error, Severity.Warning]) {
        const list = messages[severity];
        if (list && list.length > 0) {
          merged[severity] = [...(merged[severity] ?? []), ...list];
        }
      }
    }
    return merged;
  },

  errors<T, E extends LinearScanError>(result: Result<T, E>): E[] {
    return result.messages[Severity.Error] ?? [];
  },

  warnings<T, E extends LinearScanError>(result: Result<T, E>): E[] {
    return result.messages[Severity.Warning] ?? [];
  },
};
