import type { OperationSignature, PointcutRule } from '../types.js';
import {
  ANY_PARAMETER,
  MULTI_SEGMENT_WILDCARD,
  REMAINING_PARAMETERS,
  SINGLE_SEGMENT_WILDCARD,
} from './pointcutRules.js';

// Compiled name globs, keyed by pattern
const globCache = new Map<string, RegExp>();

function globToRegExp(pattern: string): RegExp {
  let compiled = globCache.get(pattern);
  if (!compiled) {
    const source = pattern
      .split('*')
      .map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
      .join('.*');
    compiled = new RegExp(`^${source}$`);
    globCache.set(pattern, compiled);
  }
  return compiled;
}

function packageMatches(pattern: string, qualifiedName: string): boolean {
  const patternSegments = pattern.split('.');
  const nameSegments = qualifiedName.split('.');
  const fixed = patternSegments[patternSegments.length - 1] === MULTI_SEGMENT_WILDCARD
    ? patternSegments.slice(0, -1)
    : patternSegments;

  if (nameSegments.length < fixed.length) {
    return false;
  }
  return fixed.every((segment, index) =>
    segment === SINGLE_SEGMENT_WILDCARD || segment === nameSegments[index]
  );
}

function parametersMatch(types: readonly string[], signature: OperationSignature): boolean {
  const open = types[types.length - 1] === REMAINING_PARAMETERS;
  const fixed = open ? types.slice(0, -1) : types;

  const countMatches = open
    ? signature.parameterCount >= fixed.length
    : signature.parameterCount === fixed.length;
  if (!countMatches) {
    return false;
  }

  // Without declared types only wildcards can match
  return fixed.every((expected, index) =>
    expected === ANY_PARAMETER || signature.parameterTypes?.[index] === expected
  );
}

/**
 * Decide whether a rule selects an operation.
 *
 * Pure and total: the same inputs always give the same answer, and anything
 * that is not a recognized rule simply does not match. Composites evaluate
 * their sub-rules in declaration order and stop as soon as the outcome is known.
 */
export function matches(rule: PointcutRule, signature: OperationSignature): boolean {
  switch (rule.kind) {
    case 'package':
      return packageMatches(rule.pattern, signature.qualifiedName);
    case 'name':
      return globToRegExp(rule.pattern).test(signature.operationName);
    case 'parameters':
      return parametersMatch(rule.types, signature);
    case 'all':
      for (const child of rule.rules) {
        if (!matches(child, signature)) return false;
      }
      return true;
    case 'any':
      for (const child of rule.rules) {
        if (matches(child, signature)) return true;
      }
      return false;
    case 'not':
      return !matches(rule.rule, signature);
    default:
      return false;
  }
}
