/**
 * Interception engine - the registration and retrieval API used while assembling an application
 *
 * ## Usage
 *
 * ```typescript
 * const engine = new InterceptionEngine();
 *
 * const repository = engine.registerComponent('bookstore.repository.BookRepository', new BookRepository());
 *
 * engine.registerAspect({
 *   name: 'Log',
 *   order: 1,
 *   pointcut: withinPackage('bookstore.repository'),
 *   advice: [{ kind: 'before', behavior: ctx => console.log(formatSignature(ctx.signature)) }],
 * });
 *
 * // Hand the proxy to whoever would have used the raw instance
 * const service = new BookService(repository.proxy);
 * ```
 *
 * Targets run with `this` bound to the raw instance, so a component calling
 * its own methods goes around the proxy and is not advised.
 */

import { AdviceRegistry } from './adviceRegistry.js';
import { describeEntry } from './chain/composeChain.js';
import { resolveEngineConfig, type EngineConfig, type EngineOptions } from './config/engineConfig.js';
import { LOG_PREFIX, LOWEST_PRECEDENCE } from './constants.js';
import { ConfigurationError } from './errors.js';
import { ProxyFactory } from './proxyFactory.js';
import {
  createSignature,
  discoverMethods,
  isCallable,
  signatureKey,
  validateQualifiedName,
} from './signature.js';
import type {
  AspectDeclaration,
  OperationDeclaration,
  OperationSignature,
  RegisteredAspect,
  TargetOperation,
} from './types.js';

interface RegisteredOperation {
  signature: OperationSignature;
  operation: TargetOperation;
}

interface RegisteredComponent {
  target: object;
  proxy: object;
  operations: Map<string, RegisteredOperation>;
}

export interface ComponentHandle<T extends object> {
  qualifiedName: string;
  signatures: OperationSignature[];
  /** Stand-in for the raw instance; registered methods resolve to their wrappers */
  proxy: T;
}

export class InterceptionEngine {
  private readonly registry = new AdviceRegistry();
  private readonly components = new Map<string, RegisteredComponent>();
  private readonly proxies: ProxyFactory;
  private readonly config: EngineConfig;

  constructor(options: EngineOptions = {}) {
    this.config = resolveEngineConfig(options);
    this.proxies = new ProxyFactory(signature => this.registry.resolveApplicable(signature));
  }

  /**
   * Register a component and its operations.
   *
   * Without `operations`, every method of the target (own and inherited) is
   * registered with its declared arity. With `operations`, only the listed
   * methods are, optionally carrying parameter type names for pointcuts.
   */
  registerComponent<T extends object>(
    qualifiedName: string,
    target: T,
    operations?: OperationDeclaration[]
  ): ComponentHandle<T> {
    validateQualifiedName(qualifiedName);
    if (this.components.has(qualifiedName)) {
      throw new ConfigurationError('DUPLICATE_COMPONENT', `Component "${qualifiedName}" is already registered`);
    }

    const registeredOperations = operations
      ? this.declaredOperations(qualifiedName, target, operations)
      : this.discoveredOperations(qualifiedName, target);

    // Traps read the instance, not the shell, so frozen instances can be proxied
    const handler: ProxyHandler<T> = {
      get: (_shell, property) => {
        const entry = typeof property === 'string' ? registeredOperations.get(property) : undefined;
        if (entry) {
          return this.proxies.wrap(entry.signature, target, entry.operation);
        }
        return Reflect.get(target, property, target);
      },
      set: (_shell, property, value) => Reflect.set(target, property, value, target),
      has: (_shell, property) => Reflect.has(target, property),
      deleteProperty: (_shell, property) => Reflect.deleteProperty(target, property),
      ownKeys: () => Reflect.ownKeys(target),
      getOwnPropertyDescriptor: (_shell, property) => {
        const descriptor = Reflect.getOwnPropertyDescriptor(target, property);
        return descriptor && { ...descriptor, configurable: true };
      },
      getPrototypeOf: () => Reflect.getPrototypeOf(target),
    };
    const shell: T = Object.create(target);
    const proxy = new Proxy(shell, handler);

    this.components.set(qualifiedName, { target, proxy, operations: registeredOperations });

    if (this.config.verbose) {
      this.config.logger.log(`${LOG_PREFIX.engine} Registered component ${qualifiedName} (${registeredOperations.size} operations)`);
    }

    return {
      qualifiedName,
      signatures: [...registeredOperations.values()].map(entry => entry.signature),
      proxy,
    };
  }

  /**
   * Register an aspect. Compiled chains are discarded so that every
   * operation picks up the new aspect set on its next call.
   */
  registerAspect(declaration: AspectDeclaration): RegisteredAspect {
    const aspect = this.registry.register(declaration);
    const discarded = this.proxies.invalidate();

    if (this.config.verbose) {
      const order = aspect.order === LOWEST_PRECEDENCE ? 'default' : String(aspect.order);
      this.config.logger.log(`${LOG_PREFIX.engine} Registered aspect ${aspect.name} (order ${order}, ${declaration.advice.length} advice)`);
      if (discarded > 0) {
        this.config.logger.log(`${LOG_PREFIX.engine} Aspect set changed, discarded ${discarded} compiled chains`);
      }
    }

    return aspect;
  }

  getSignature(qualifiedName: string, operationName: string): OperationSignature {
    return this.lookup(qualifiedName, operationName).signature;
  }

  /**
   * The wrapper to call in place of the operation
   */
  getProxy(signature: OperationSignature): TargetOperation {
    const component = this.component(signature.qualifiedName);
    const entry = this.lookup(signature.qualifiedName, signature.operationName);
    return this.proxies.wrap(entry.signature, component.target, entry.operation);
  }

  /**
   * The component's stand-in, as returned by registerComponent
   */
  getComponentProxy(qualifiedName: string): object {
    return this.component(qualifiedName).proxy;
  }

  /**
   * Labels of the advice applied to an operation, in priority order, e.g.
   * `['Log.before', 'Sec.before', 'Log.afterFinally']`
   */
  describeChain(signature: OperationSignature): string[] {
    const entry = this.lookup(signature.qualifiedName, signature.operationName);
    const chain = this.proxies.compiledChain(entry.signature, entry.operation);
    return chain ? chain.entries.map(describeEntry) : [];
  }

  isAdvised(signature: OperationSignature): boolean {
    return this.describeChain(signature).length > 0;
  }

  listAspects(): readonly RegisteredAspect[] {
    return this.registry.list();
  }

  listComponents(): string[] {
    return [...this.components.keys()];
  }

  private component(qualifiedName: string): RegisteredComponent {
    const component = this.components.get(qualifiedName);
    if (!component) {
      throw new ConfigurationError('UNKNOWN_COMPONENT', `No component registered as "${qualifiedName}"`);
    }
    return component;
  }

  private lookup(qualifiedName: string, operationName: string): RegisteredOperation {
    const entry = this.component(qualifiedName).operations.get(operationName);
    if (!entry) {
      throw new ConfigurationError('UNKNOWN_OPERATION', `Component "${qualifiedName}" has no operation "${operationName}"`);
    }
    return entry;
  }

  private discoveredOperations(qualifiedName: string, target: object): Map<string, RegisteredOperation> {
    const operations = new Map<string, RegisteredOperation>();
    for (const [name, operation] of discoverMethods(target)) {
      operations.set(name, { signature: createSignature(qualifiedName, name, operation.length), operation });
    }
    return operations;
  }

  private declaredOperations(
    qualifiedName: string,
    target: object,
    declarations: OperationDeclaration[]
  ): Map<string, RegisteredOperation> {
    const operations = new Map<string, RegisteredOperation>();

    for (const declaration of declarations) {
      if (operations.has(declaration.name)) {
        throw new ConfigurationError('INVALID_NAME', `Operation "${declaration.name}" is declared twice on ${qualifiedName}`);
      }

      const operation: unknown = Reflect.get(target, declaration.name);
      if (!isCallable(operation)) {
        throw new ConfigurationError('UNKNOWN_OPERATION', `Component "${qualifiedName}" has no method "${declaration.name}"`);
      }

      const signature = createSignature(
        qualifiedName,
        declaration.name,
        declaration.parameterTypes ?? operation.length
      );
      operations.set(declaration.name, { signature, operation });
    }

    return operations;
  }
}
