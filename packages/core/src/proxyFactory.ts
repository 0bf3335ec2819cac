/**
 * Proxy Factory - produces the callable substituted for a target operation
 *
 * A wrapper looks up the compiled chain for its signature (composing and
 * caching it on first use), creates a fresh InvocationContext and runs the
 * chain. Operations no aspect applies to are cached as unadvised and called
 * directly, without a context.
 *
 * Wrappers never log, time or otherwise act on their own; everything
 * observable comes from advice.
 */

import { composeChain } from './chain/composeChain.js';
import { InvocationContext } from './invocationContext.js';
import { signatureKey } from './signature.js';
import type { AdviceEntry, CompiledChain, OperationSignature, TargetOperation } from './types.js';

export type AdviceResolver = (signature: OperationSignature) => readonly AdviceEntry[];

export class ProxyFactory {
  // null marks an operation with no applicable advice
  private readonly chains = new Map<string, CompiledChain | null>();
  private readonly wrappers = new Map<string, TargetOperation>();

  constructor(private readonly resolveAdvice: AdviceResolver) {}

  /**
   * Wrapper for one operation of `target`. Repeated calls for the same
   * signature return the same function.
   */
  wrap(signature: OperationSignature, target: object, operation: TargetOperation): TargetOperation {
    const key = signatureKey(signature);
    const existing = this.wrappers.get(key);
    if (existing) {
      return existing;
    }

    const wrapper = (...args: unknown[]): unknown => {
      const chain = this.chainFor(key, signature, operation);
      if (chain === null) {
        return Reflect.apply(operation, target, args);
      }
      return chain.invoke(new InvocationContext(signature, target, args));
    };
    Object.defineProperty(wrapper, 'name', { value: operation.name });
    Object.defineProperty(wrapper, 'length', { value: operation.length });

    this.wrappers.set(key, wrapper);
    return wrapper;
  }

  /**
   * The chain currently used for a signature, or null when unadvised
   */
  compiledChain(signature: OperationSignature, operation: TargetOperation): CompiledChain | null {
    return this.chainFor(signatureKey(signature), signature, operation);
  }

  /**
   * Drop every compiled chain; the next call to each operation recomposes it.
   * Returns how many chains were discarded.
   */
  invalidate(): number {
    const discarded = this.chains.size;
    this.chains.clear();
    return discarded;
  }

  get cachedChainCount(): number {
    return this.chains.size;
  }

  private chainFor(key: string, signature: OperationSignature, operation: TargetOperation): CompiledChain | null {
    const cached = this.chains.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const entries = this.resolveAdvice(signature);
    const chain = entries.length === 0 ? null : composeChain(signature, entries, operation);
    // Published only once fully built
    this.chains.set(key, chain);
    return chain;
  }
}
