import type { InvocationContext } from './invocationContext.js';

// Identifies one callable operation of a registered component
export interface OperationSignature {
  readonly qualifiedName: string;
  readonly operationName: string;
  readonly parameterCount: number;
  readonly parameterTypes?: readonly string[];
}

// Explicit operation declaration accepted by registerComponent
export interface OperationDeclaration {
  name: string;
  parameterTypes?: string[];
}

// Pointcut rules: a structured tree instead of an expression language
export interface PackagePatternRule {
  readonly kind: 'package';
  readonly pattern: string;
}

export interface NamePatternRule {
  readonly kind: 'name';
  readonly pattern: string;
}

export interface ParametersRule {
  readonly kind: 'parameters';
  readonly types: readonly string[];
}

export interface AllOfRule {
  readonly kind: 'all';
  readonly rules: readonly PointcutRule[];
}

export interface AnyOfRule {
  readonly kind: 'any';
  readonly rules: readonly PointcutRule[];
}

export interface NotRule {
  readonly kind: 'not';
  readonly rule: PointcutRule;
}

export type PointcutRule =
  | PackagePatternRule
  | NamePatternRule
  | ParametersRule
  | AllOfRule
  | AnyOfRule
  | NotRule;

export const AdviceKind = {
  Before: 'before',
  AfterReturning: 'afterReturning',
  AfterThrowing: 'afterThrowing',
  AfterFinally: 'afterFinally',
  Around: 'around',
} as const;

export type AdviceKind = (typeof AdviceKind)[keyof typeof AdviceKind];

/**
 * Continuation handed to around advice. Runs the rest of the chain,
 * including the target, optionally with replacement arguments.
 */
export type Proceed = (args?: readonly unknown[]) => unknown;

export type BeforeAdvice = (context: InvocationContext) => void;
export type AfterReturningAdvice = (context: InvocationContext, result: unknown) => void;
export type AfterThrowingAdvice = (context: InvocationContext, failure: unknown) => void;
export type AfterFinallyAdvice = (context: InvocationContext) => void;
export type AroundAdvice = (context: InvocationContext, proceed: Proceed) => unknown;

export interface AdviceBehaviors {
  before: BeforeAdvice;
  afterReturning: AfterReturningAdvice;
  afterThrowing: AfterThrowingAdvice;
  afterFinally: AfterFinallyAdvice;
  around: AroundAdvice;
}

// One piece of advice as declared; `pointcut` overrides the aspect's rule
export type AdviceDeclaration = {
  [K in AdviceKind]: {
    readonly kind: K;
    readonly behavior: AdviceBehaviors[K];
    readonly pointcut?: PointcutRule;
  };
}[AdviceKind];

export interface AspectDeclaration {
  name: string;
  /** Lower runs first. Defaults to LOWEST_PRECEDENCE. */
  order?: number;
  pointcut?: PointcutRule;
  advice: readonly AdviceDeclaration[];
}

// An aspect after registration: order resolved, sequence assigned
export interface RegisteredAspect {
  readonly name: string;
  readonly order: number;
  readonly sequence: number;
}

// Resolved advice, bound to its owning aspect and effective rule
export type AdviceEntry = AdviceDeclaration & {
  readonly aspect: RegisteredAspect;
  readonly index: number;
  readonly pointcut: PointcutRule;
};

export type TargetOperation = (...args: unknown[]) => unknown;

export interface CompiledChain {
  readonly signature: OperationSignature;
  readonly entries: readonly AdviceEntry[];
  invoke(context: InvocationContext): unknown;
}

export interface EngineLogger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
