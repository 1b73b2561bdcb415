/**
 * Non-fatal diagnostic channel.
 *
 * Diagnostics go to the innermost capture scope, else to registered
 * listeners, else to the configured mode (log, silent or error).
 */

import { getConfig, getLogger } from './config.js';
import { SimilarityError } from './errors/index.js';

export type DiagnosticCode = 'BOTH_SETS_EMPTY' | 'EMPTY_SET' | 'UNIVERSE_NOT_SUPERSET';

export interface SimilarityDiagnostic {
  code: DiagnosticCode;
  message: string;
  /** Name of the measure that emitted it */
  measure: string;
}

export type DiagnosticListener = (diagnostic: SimilarityDiagnostic) => void;

export type CaptureOptions = {
  /** Throw the first diagnostic as a SimilarityError instead of collecting it. */
  raise?: boolean;
};

export type CaptureResult<T> = {
  result: T;
  diagnostics: SimilarityDiagnostic[];
};

type CaptureScope = {
  raise: boolean;
  diagnostics: SimilarityDiagnostic[];
};

const scopes: CaptureScope[] = [];
const listeners = new Set<DiagnosticListener>();

function toError(diagnostic: SimilarityDiagnostic): SimilarityError {
  return new SimilarityError({
    code: 'DIAGNOSTIC_RAISED',
    message: diagnostic.message,
    measure: diagnostic.measure,
    context: { diagnostic: diagnostic.code },
  });
}

export function emitDiagnostic(diagnostic: SimilarityDiagnostic): void {
  const scope = scopes[scopes.length - 1];
  if (scope) {
    if (scope.raise) throw toError(diagnostic);
    scope.diagnostics.push(diagnostic);
    return;
  }

  if (listeners.size > 0) {
    for (const listener of listeners) {
      listener(diagnostic);
    }
    return;
  }

  switch (getConfig().diagnostics) {
    case 'silent':
      return;
    case 'error':
      throw toError(diagnostic);
    case 'log':
      getLogger().warn(diagnostic.message, {
        measure: diagnostic.measure,
        diagnostic: diagnostic.code,
      });
      return;
  }
}

/**
 * Run `fn` and collect the diagnostics it emits.
 */
export function captureDiagnostics<T>(fn: () => T, options?: CaptureOptions): CaptureResult<T> {
  const scope: CaptureScope = { raise: options?.raise ?? false, diagnostics: [] };
  scopes.push(scope);
  try {
    const result = fn();
    return { result, diagnostics: scope.diagnostics };
  } finally {
    scopes.splice(scopes.lastIndexOf(scope), 1);
  }
}

/**
 * Register a listener for diagnostics emitted outside any capture scope.
 *
 * @returns Function that removes the listener
 */
export function onDiagnostic(listener: DiagnosticListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}
