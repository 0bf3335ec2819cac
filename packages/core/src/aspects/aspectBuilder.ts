import type {
  AdviceDeclaration,
  AfterFinallyAdvice,
  AfterReturningAdvice,
  AfterThrowingAdvice,
  AroundAdvice,
  AspectDeclaration,
  BeforeAdvice,
  PointcutRule,
} from '../types.js';

/**
 * Fluent alternative to writing an AspectDeclaration literal.
 *
 * ```typescript
 * const log = aspect('Log')
 *   .order(1)
 *   .pointcut(withinPackage('repo'))
 *   .before(ctx => trace.push('Log.before'))
 *   .afterFinally(ctx => trace.push('Log.afterFinally'))
 *   .build();
 * ```
 *
 * Each advice method takes an optional rule that overrides the aspect's pointcut.
 */
export class AspectBuilder {
  private orderValue: number | undefined;
  private rule: PointcutRule | undefined;
  private readonly advice: AdviceDeclaration[] = [];

  constructor(private readonly name: string) {}

  order(value: number): this {
    this.orderValue = value;
    return this;
  }

  pointcut(rule: PointcutRule): this {
    this.rule = rule;
    return this;
  }

  before(behavior: BeforeAdvice, pointcut?: PointcutRule): this {
    return this.add({ kind: 'before', behavior, pointcut });
  }

  afterReturning(behavior: AfterReturningAdvice, pointcut?: PointcutRule): this {
    return this.add({ kind: 'afterReturning', behavior, pointcut });
  }

  afterThrowing(behavior: AfterThrowingAdvice, pointcut?: PointcutRule): this {
    return this.add({ kind: 'afterThrowing', behavior, pointcut });
  }

  afterFinally(behavior: AfterFinallyAdvice, pointcut?: PointcutRule): this {
    return this.add({ kind: 'afterFinally', behavior, pointcut });
  }

  around(behavior: AroundAdvice, pointcut?: PointcutRule): this {
    return this.add({ kind: 'around', behavior, pointcut });
  }

  build(): AspectDeclaration {
    return {
      name: this.name,
      order: this.orderValue,
      pointcut: this.rule,
      advice: [...this.advice],
    };
  }

  private add(declaration: AdviceDeclaration): this {
    this.advice.push(declaration);
    return this;
  }
}

export function aspect(name: string): AspectBuilder {
  return new AspectBuilder(name);
}
