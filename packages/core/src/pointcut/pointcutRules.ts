/**
 * Pointcut rule declarations
 *
 * Rules are plain data, built through the factories below. Every factory
 * validates its pattern immediately, so a malformed rule fails while the
 * application is assembled and never while a call is in flight.
 *
 * ## Pattern syntax
 *
 * - **Package** (`withinPackage`): dot-separated segments matched as a prefix of
 *   the component's qualified name. `*` stands for exactly one segment, a final
 *   `**` for any number of trailing segments (including none).
 * - **Name** (`named`): a glob over the operation name, `*` matching any run of
 *   characters.
 * - **Parameters** (`withParameters`): one entry per parameter, either a type
 *   name, `*` for any single parameter, or a final `..` for any remaining ones.
 *
 * ## Example
 *
 * ```typescript
 * const applicationLayers = anyOf(
 *   withinPackage('bookstore.repository'),
 *   withinPackage('bookstore.service'),
 *   withinPackage('bookstore.controller'),
 * );
 * const writes = allOf(applicationLayers, anyOf(named('save*'), named('delete*')));
 * ```
 */

import { ConfigurationError } from '../errors.js';
import { isIdentifier } from '../signature.js';
import type {
  AllOfRule,
  AnyOfRule,
  NamePatternRule,
  NotRule,
  PackagePatternRule,
  ParametersRule,
  PointcutRule,
} from '../types.js';

export const SINGLE_SEGMENT_WILDCARD = '*';
export const MULTI_SEGMENT_WILDCARD = '**';
export const ANY_PARAMETER = '*';
export const REMAINING_PARAMETERS = '..';

const NAME_GLOB = /^[\w$*]+$/;
const TYPE_NAME = /^[A-Za-z_$][\w$.]*(\[\])*$/;

function malformed(message: string): ConfigurationError {
  return new ConfigurationError('MALFORMED_PATTERN', message);
}

function validatePackagePattern(pattern: string): void {
  const segments = pattern.split('.');

  segments.forEach((segment, index) => {
    const isLast = index === segments.length - 1;
    if (segment === MULTI_SEGMENT_WILDCARD && !isLast) {
      throw malformed(`Package pattern "${pattern}": "**" may only be the last segment`);
    }
    if (segment !== MULTI_SEGMENT_WILDCARD && segment !== SINGLE_SEGMENT_WILDCARD && !isIdentifier(segment)) {
      throw malformed(`Package pattern "${pattern}": invalid segment "${segment}"`);
    }
  });
}

function validateNamePattern(pattern: string): void {
  if (!NAME_GLOB.test(pattern)) {
    throw malformed(`Name pattern "${pattern}" may only contain identifier characters and "*"`);
  }
}

function validateParameterTypes(types: readonly string[]): void {
  types.forEach((type, index) => {
    if (type === REMAINING_PARAMETERS) {
      if (index !== types.length - 1) {
        throw malformed(`Parameter pattern (${types.join(', ')}): ".." may only be the last entry`);
      }
      return;
    }
    if (type !== ANY_PARAMETER && !TYPE_NAME.test(type)) {
      throw malformed(`Parameter pattern (${types.join(', ')}): invalid type "${type}"`);
    }
  });
}

/**
 * Validate a rule tree, throwing ConfigurationError on the first problem
 */
export function validatePointcut(rule: PointcutRule): void {
  switch (rule.kind) {
    case 'package':
      validatePackagePattern(rule.pattern);
      return;
    case 'name':
      validateNamePattern(rule.pattern);
      return;
    case 'parameters':
      validateParameterTypes(rule.types);
      return;
    case 'all':
    case 'any':
      if (rule.rules.length === 0) {
        throw malformed(`Composite "${rule.kind}" rule needs at least one sub-rule`);
      }
      rule.rules.forEach(validatePointcut);
      return;
    case 'not':
      validatePointcut(rule.rule);
      return;
    default: {
      const unknownRule: never = rule;
      throw malformed(`Unknown pointcut rule ${JSON.stringify(unknownRule)}`);
    }
  }
}

function declare<T extends PointcutRule>(rule: T): T {
  validatePointcut(rule);
  return Object.freeze(rule);
}

export function withinPackage(pattern: string): PackagePatternRule {
  return declare({ kind: 'package', pattern });
}

export function named(pattern: string): NamePatternRule {
  return declare({ kind: 'name', pattern });
}

export function withParameters(...types: string[]): ParametersRule {
  return declare({ kind: 'parameters', types: Object.freeze(types) });
}

export function allOf(...rules: PointcutRule[]): AllOfRule {
  return declare({ kind: 'all', rules: Object.freeze(rules) });
}

export function anyOf(...rules: PointcutRule[]): AnyOfRule {
  return declare({ kind: 'any', rules: Object.freeze(rules) });
}

export function not(rule: PointcutRule): NotRule {
  return declare({ kind: 'not', rule });
}
