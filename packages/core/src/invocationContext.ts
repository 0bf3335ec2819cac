import type { OperationSignature } from './types.js';

type Slot = { readonly value: unknown } | undefined;

/**
 * Per-call record passed through an advice chain.
 *
 * One instance is created for every call through a proxy and is never shared
 * with another call. Advice may rewrite `args` and keep scratch values in
 * `attributes`; the result and failure slots are filled in by the chain.
 */
export class InvocationContext {
  /** Arguments the target will receive */
  public args: unknown[];

  /** Scratch space shared by the advice of this call */
  public readonly attributes = new Map<string, unknown>();

  private resultSlot: Slot;
  private failureSlot: Slot;

  constructor(
    public readonly signature: OperationSignature,
    public readonly target: object,
    args: readonly unknown[]
  ) {
    this.args = [...args];
  }

  get hasResult(): boolean {
    return this.resultSlot !== undefined;
  }

  get result(): unknown {
    return this.resultSlot?.value;
  }

  get hasFailure(): boolean {
    return this.failureSlot !== undefined;
  }

  get failure(): unknown {
    return this.failureSlot?.value;
  }

  /** @internal */
  recordResult(value: unknown): void {
    this.resultSlot = { value };
    this.failureSlot = undefined;
  }

  /** @internal */
  recordFailure(error: unknown): void {
    this.failureSlot = { value: error };
    this.resultSlot = undefined;
  }
}
