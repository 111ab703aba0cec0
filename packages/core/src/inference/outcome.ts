/**
 * Inference streams and their outcomes.
 *
 * An `Inference` yields values lazily and returns how it ended: `done`, or
 * `failed` with the reason. Cycle cuts end as `done` without values.
 */

import type { InferenceFailure } from '../errors/TesseraError.js';
import type { InferredValue } from './values.js';

export type InferenceOutcome = { kind: 'done' } | { kind: 'failed'; error: InferenceFailure };

export type Inference = Generator<InferredValue, InferenceOutcome, undefined>;

export type InferenceResult =
  | { kind: 'values'; values: InferredValue[] }
  | { kind: 'empty' }
  | { kind: 'failed'; error: InferenceFailure };

export const DONE: InferenceOutcome = Object.freeze({ kind: 'done' });

export function fail(error: InferenceFailure): InferenceOutcome {
  return { kind: 'failed', error };
}

/** Forward every value, calling `onValue` first */
export function* tap(inference: Inference, onValue: (value: InferredValue) => void): Inference {
  try {
    let step = inference.next();
    while (step.done !== true) {
      onValue(step.value);
      yield step.value;
      step = inference.next();
    }
    return step.value;
  } finally {
    // closes the source when the consumer stops early
    inference.return(DONE);
  }
}

export function* mapValues(inference: Inference, map: (value: InferredValue) => InferredValue): Inference {
  try {
    let step = inference.next();
    while (step.done !== true) {
      yield map(step.value);
      step = inference.next();
    }
    return step.value;
  } finally {
    // closes the source when the consumer stops early
    inference.return(DONE);
  }
}

export function* filterValues(inference: Inference, keep: (value: InferredValue) => boolean): Inference {
  try {
    let step = inference.next();
    while (step.done !== true) {
      if (keep(step.value)) yield step.value;
      step = inference.next();
    }
    return step.value;
  } finally {
    // closes the source when the consumer stops early
    inference.return(DONE);
  }
}

/**
 * Drain an inference. Values win over a trailing failure: a stream that
 * produced anything is reported as `values`.
 */
export function collectInference(inference: Inference): InferenceResult {
  const values: InferredValue[] = [];
  let step = inference.next();
  while (step.done !== true) {
    values.push(step.value);
    step = inference.next();
  }
  if (values.length > 0) return { kind: 'values', values };
  if (step.value.kind === 'failed') return { kind: 'failed', error: step.value.error };
  return { kind: 'empty' };
}

/** Values only; failures and cycle cuts give an empty list */
export function inferredValues(inference: Inference): InferredValue[] {
  const result = collectInference(inference);
  return result.kind === 'values' ? result.values : [];
}

/**
 * Forward the values of `expand(value)` for every value of `source`.
 * Returns the source's outcome; a failed expansion goes to `onFailure`.
 */
export function* flatMapValues(
  source: Inference,
  expand: (value: InferredValue) => Inference,
  onFailure: (error: InferenceFailure, value: InferredValue) => void
): Inference {
  try {
    let step = source.next();
    while (step.done !== true) {
      const outcome = yield* expand(step.value);
      if (outcome.kind === 'failed') onFailure(outcome.error, step.value);
      step = source.next();
    }
    return step.value;
  } finally {
    source.return(DONE);
  }
}
