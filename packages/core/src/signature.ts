/**
 * Operation signatures - identity of every callable unit the engine can wrap
 */

import { SIGNATURE_KEY_SEPARATOR } from './constants.js';
import { ConfigurationError } from './errors.js';
import type { OperationSignature, TargetOperation } from './types.js';

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

export function isIdentifier(value: string): boolean {
  return IDENTIFIER.test(value);
}

export function isCallable(value: unknown): value is TargetOperation {
  return typeof value === 'function';
}

/**
 * Check a dot-separated component name such as `bookstore.repository.BookRepository`
 */
export function validateQualifiedName(qualifiedName: string): void {
  if (!qualifiedName.split('.').every(isIdentifier)) {
    throw new ConfigurationError('INVALID_NAME', `Invalid qualified name "${qualifiedName}"`);
  }
}

/**
 * Create an immutable signature. Pass either the arity or the declared
 * parameter type names (the arity is then their count).
 */
export function createSignature(
  qualifiedName: string,
  operationName: string,
  parameters: number | readonly string[]
): OperationSignature {
  validateQualifiedName(qualifiedName);

  if (!isIdentifier(operationName)) {
    throw new ConfigurationError('INVALID_NAME', `Invalid operation name "${operationName}" on ${qualifiedName}`);
  }

  if (typeof parameters === 'number') {
    if (!Number.isInteger(parameters) || parameters < 0) {
      throw new ConfigurationError('INVALID_NAME', `Invalid parameter count ${parameters} for ${qualifiedName}.${operationName}`);
    }
    return Object.freeze({ qualifiedName, operationName, parameterCount: parameters });
  }

  return Object.freeze({
    qualifiedName,
    operationName,
    parameterCount: parameters.length,
    parameterTypes: Object.freeze([...parameters]),
  });
}

/**
 * Cache key for a signature. Methods cannot be overloaded in JavaScript,
 * so component and operation name identify it.
 */
export function signatureKey(signature: OperationSignature): string {
  return `${signature.qualifiedName}${SIGNATURE_KEY_SEPARATOR}${signature.operationName}`;
}

/**
 * Human-readable form, e.g. `repo.save(1)` or `repo.save(Book)`
 */
export function formatSignature(signature: OperationSignature): string {
  const parameters = signature.parameterTypes
    ? signature.parameterTypes.join(', ')
    : String(signature.parameterCount);
  return `${signature.qualifiedName}.${signature.operationName}(${parameters})`;
}

/**
 * Collect the methods of an object, own and inherited, stopping at Object.prototype.
 * Closer definitions win over the ones they override.
 */
export function discoverMethods(target: object): Map<string, TargetOperation> {
  const methods = new Map<string, TargetOperation>();
  let current: object | null = target;

  while (current !== null && current !== Object.prototype) {
    for (const name of Object.getOwnPropertyNames(current)) {
      if (name === 'constructor' || methods.has(name) || !isIdentifier(name)) {
        continue;
      }
      // Accessors are not operations
      const value: unknown = Object.getOwnPropertyDescriptor(current, name)?.value;
      if (isCallable(value)) {
        methods.set(name, value);
      }
    }
    current = Object.getPrototypeOf(current);
  }

  return methods;
}
