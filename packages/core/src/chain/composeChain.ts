/**
 * Advice Chain Composer - turns resolved advice into one callable chain per operation
 *
 * ## Shape of a chain
 *
 * ```
 * around (lowest order)            <- outermost, decides whether to proceed
 *   around (next order)
 *     stages                       <- before / after* advice, grouped per aspect
 *       target                     <- the real operation
 * ```
 *
 * Around advice is layered the same way middleware is: each one receives a
 * `proceed` continuation for everything inside it, and the first (lowest
 * order) ends up outermost. The layers are built with a right fold, so the
 * innermost layer is created first.
 *
 * The non-around advice forms a single innermost layer. All of it is scheduled
 * relative to the target call, in ascending priority order:
 *
 * 1. `before` advice runs aspect by aspect. Once all of an aspect's `before`
 *    advice has completed, that aspect is *entered* and owes its after advice.
 * 2. The target runs, unless a `before` advice threw.
 * 3. On success, `afterReturning` advice of entered aspects observes the result.
 *    On failure (target or `before`), `afterThrowing` advice of entered aspects
 *    receives it.
 * 4. `afterFinally` advice of entered aspects always runs, each one even if an
 *    earlier one threw.
 *
 * An advice that throws replaces the outcome and skips the remaining advice of
 * its kind; `afterFinally` obligations are still honoured. Nothing is swallowed:
 * when several `afterFinally` advice fail, an `AdviceFailures` error carries
 * them all.
 */

import { AdviceFailures } from '../errors.js';
import type { InvocationContext } from '../invocationContext.js';
import { formatSignature } from '../signature.js';
import type {
  AdviceEntry,
  AfterFinallyAdvice,
  AfterReturningAdvice,
  AfterThrowingAdvice,
  AroundAdvice,
  BeforeAdvice,
  CompiledChain,
  OperationSignature,
  Proceed,
  RegisteredAspect,
  TargetOperation,
} from '../types.js';

type Layer = (context: InvocationContext) => unknown;

type Outcome =
  | { readonly failed: false; readonly value: unknown }
  | { readonly failed: true; readonly error: unknown };

interface AdviceStage {
  readonly aspect: RegisteredAspect;
  readonly before: BeforeAdvice[];
  readonly afterReturning: AfterReturningAdvice[];
  readonly afterThrowing: AfterThrowingAdvice[];
  readonly afterFinally: AfterFinallyAdvice[];
}

const succeeded = (value: unknown): Outcome => ({ failed: false, value });
const failed = (error: unknown): Outcome => ({ failed: true, error });

/**
 * Label used in diagnostics, e.g. `Log.before`
 */
export function describeEntry(entry: AdviceEntry): string {
  return `${entry.aspect.name}.${entry.kind}`;
}

/**
 * Group non-around entries per aspect. Entries arrive sorted, so each
 * aspect's entries are contiguous.
 */
function buildStages(entries: readonly AdviceEntry[]): AdviceStage[] {
  const stages: AdviceStage[] = [];

  for (const entry of entries) {
    if (entry.kind === 'around') continue;

    let stage = stages[stages.length - 1];
    if (!stage || stage.aspect !== entry.aspect) {
      stage = { aspect: entry.aspect, before: [], afterReturning: [], afterThrowing: [], afterFinally: [] };
      stages.push(stage);
    }

    switch (entry.kind) {
      case 'before':
        stage.before.push(entry.behavior);
        break;
      case 'afterReturning':
        stage.afterReturning.push(entry.behavior);
        break;
      case 'afterThrowing':
        stage.afterThrowing.push(entry.behavior);
        break;
      case 'afterFinally':
        stage.afterFinally.push(entry.behavior);
        break;
    }
  }

  return stages;
}

function notifyResult(stages: readonly AdviceStage[], entered: number, context: InvocationContext, value: unknown): Outcome {
  for (let i = 0; i < entered; i++) {
    for (const advice of stages[i].afterReturning) {
      try {
        advice(context, value);
      } catch (error) {
        return failed(error);
      }
    }
  }
  return succeeded(value);
}

function notifyFailure(stages: readonly AdviceStage[], entered: number, context: InvocationContext, error: unknown): Outcome {
  for (let i = 0; i < entered; i++) {
    for (const advice of stages[i].afterThrowing) {
      try {
        advice(context, error);
      } catch (adviceError) {
        return failed(adviceError);
      }
    }
  }
  return failed(error);
}

function runFinally(stages: readonly AdviceStage[], entered: number, context: InvocationContext, outcome: Outcome): Outcome {
  const failures: unknown[] = [];

  for (let i = 0; i < entered; i++) {
    for (const advice of stages[i].afterFinally) {
      try {
        advice(context);
      } catch (error) {
        failures.push(error);
      }
    }
  }

  if (failures.length === 0) {
    return outcome;
  }
  if (failures.length === 1) {
    return failed(failures[0]);
  }
  return failed(new AdviceFailures(
    `${failures.length} afterFinally advice failed on ${formatSignature(context.signature)}`,
    failures
  ));
}

function record(context: InvocationContext, outcome: Outcome): void {
  if (outcome.failed) {
    context.recordFailure(outcome.error);
  } else {
    context.recordResult(outcome.value);
  }
}

/**
 * Innermost layer: staged before/after advice around the target call
 */
function stagedLayer(stages: readonly AdviceStage[], terminal: Layer): Layer {
  if (stages.length === 0) {
    return terminal;
  }

  return (context) => {
    let entered = 0;
    let outcome: Outcome;

    try {
      for (const stage of stages) {
        for (const advice of stage.before) {
          advice(context);
        }
        entered += 1;
      }
      outcome = succeeded(terminal(context));
    } catch (error) {
      outcome = failed(error);
    }

    record(context, outcome);
    outcome = outcome.failed
      ? notifyFailure(stages, entered, context, outcome.error)
      : notifyResult(stages, entered, context, outcome.value);

    record(context, outcome);
    outcome = runFinally(stages, entered, context, outcome);

    record(context, outcome);
    if (outcome.failed) {
      throw outcome.error;
    }
    return outcome.value;
  };
}

function aroundLayer(advice: AroundAdvice, next: Layer): Layer {
  return (context) => {
    const proceed: Proceed = (args) => {
      if (args) {
        context.args = [...args];
      }
      return next(context);
    };

    let value: unknown;
    try {
      value = advice(context, proceed);
    } catch (error) {
      context.recordFailure(error);
      throw error;
    }
    context.recordResult(value);
    return value;
  };
}

/**
 * Compose the chain for one operation. `entries` must already be in priority
 * order (see AdviceRegistry.resolveApplicable). The returned chain is fully
 * built and frozen before it is handed out.
 */
export function composeChain(
  signature: OperationSignature,
  entries: readonly AdviceEntry[],
  target: TargetOperation
): CompiledChain {
  const terminal: Layer = (context) => {
    let value: unknown;
    try {
      value = Reflect.apply(target, context.target, context.args);
    } catch (error) {
      context.recordFailure(error);
      throw error;
    }
    context.recordResult(value);
    return value;
  };

  const arounds: AroundAdvice[] = [];
  for (const entry of entries) {
    if (entry.kind === 'around') arounds.push(entry.behavior);
  }

  const invoke = arounds.reduceRight<Layer>(
    (next, advice) => aroundLayer(advice, next),
    stagedLayer(buildStages(entries), terminal)
  );

  return Object.freeze({
    signature,
    entries: Object.freeze([...entries]),
    invoke,
  });
}
