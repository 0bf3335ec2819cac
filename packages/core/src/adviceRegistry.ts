/**
 * Advice Registry - holds declared aspects and resolves which advice applies to an operation
 *
 * ## Ordering
 *
 * Applicable advice is sorted by the owning aspect's `order` (lower first),
 * then by the sequence in which aspects were registered, then by declaration
 * position inside the aspect. Aspects without an explicit order get
 * `LOWEST_PRECEDENCE` and therefore follow every ordered aspect.
 *
 * Equal orders fall back to registration order. That tie-break is
 * deterministic here, but callers should treat it as policy rather than
 * something to build on: give aspects distinct orders when their relative
 * position matters.
 */

import { LOWEST_PRECEDENCE } from './constants.js';
import { ConfigurationError } from './errors.js';
import { matches } from './pointcut/matchPointcut.js';
import { validatePointcut } from './pointcut/pointcutRules.js';
import {
  AdviceKind,
  type AdviceEntry,
  type AspectDeclaration,
  type OperationSignature,
  type RegisteredAspect,
} from './types.js';

const ADVICE_KINDS: readonly string[] = Object.values(AdviceKind);

function compareEntries(a: AdviceEntry, b: AdviceEntry): number {
  if (a.aspect.order !== b.aspect.order) {
    return a.aspect.order < b.aspect.order ? -1 : 1;
  }
  if (a.aspect.sequence !== b.aspect.sequence) {
    return a.aspect.sequence - b.aspect.sequence;
  }
  return a.index - b.index;
}

function resolveOrder(declaration: AspectDeclaration): number {
  if (declaration.order === undefined) {
    return LOWEST_PRECEDENCE;
  }
  if (!Number.isSafeInteger(declaration.order) || declaration.order >= LOWEST_PRECEDENCE) {
    throw new ConfigurationError(
      'INVALID_ORDER',
      `Aspect "${declaration.name}": order must be an integer below LOWEST_PRECEDENCE, got ${declaration.order}`
    );
  }
  return declaration.order;
}

export class AdviceRegistry {
  private readonly aspects: RegisteredAspect[] = [];
  private readonly entries: AdviceEntry[] = [];
  private nextSequence = 0;

  /**
   * Validate and register an aspect. Nothing is recorded if validation fails.
   */
  register(declaration: AspectDeclaration): RegisteredAspect {
    const name = declaration.name.trim();
    if (name === '') {
      throw new ConfigurationError('INVALID_NAME', 'Aspect name must not be empty');
    }
    if (this.aspects.some(aspect => aspect.name === name)) {
      throw new ConfigurationError('DUPLICATE_ASPECT', `Aspect "${name}" is already registered`);
    }

    const order = resolveOrder(declaration);
    if (declaration.advice.length === 0) {
      throw new ConfigurationError('INVALID_ADVICE', `Aspect "${name}" declares no advice`);
    }

    const registered: RegisteredAspect = Object.freeze({ name, order, sequence: this.nextSequence });

    const entries = declaration.advice.map((advice, index): AdviceEntry => {
      if (!ADVICE_KINDS.includes(advice.kind) || typeof advice.behavior !== 'function') {
        throw new ConfigurationError('INVALID_ADVICE', `Aspect "${name}": advice #${index} is not a valid advice declaration`);
      }

      const pointcut = advice.pointcut ?? declaration.pointcut;
      if (!pointcut) {
        throw new ConfigurationError('INVALID_ADVICE', `Aspect "${name}": ${advice.kind} advice #${index} has no pointcut`);
      }
      validatePointcut(pointcut);

      return Object.freeze({ ...advice, aspect: registered, index, pointcut });
    });

    this.nextSequence += 1;
    this.aspects.push(registered);
    this.entries.push(...entries);
    return registered;
  }

  /**
   * All advice whose rule selects the signature, in execution priority order
   */
  resolveApplicable(signature: OperationSignature): AdviceEntry[] {
    return this.entries
      .filter(entry => matches(entry.pointcut, signature))
      .sort(compareEntries);
  }

  /**
   * Registered aspects in registration order
   */
  list(): readonly RegisteredAspect[] {
    return [...this.aspects];
  }

  get size(): number {
    return this.aspects.length;
  }
}
