import type {
  CombinationPolicy,
  Comparator,
  Condition,
  MetricVariable,
} from "../types/index.js";
import type { MetricResolver, MetricSource } from "../metrics/source.js";

export const COMPARATORS: readonly Comparator[] = ["lt", "lte", "eq", "gte", "gt"];
export const POLICIES: readonly CombinationPolicy[] = ["all", "any"];

/**
 * Build an immutable condition.
 */
export function condition(
  variable: MetricVariable,
  comparator: Comparator,
  threshold: number,
): Condition {
  return Object.freeze({ variable, comparator, threshold });
}

/**
 * Tolerance-based float equality. Relative tolerance of 1e-6 on the larger
 * magnitude, with a floor of a few ulps around zero.
 */
export function approximately(a: number, b: number): boolean {
  return (
    Math.abs(b - a) <
    Math.max(1e-6 * Math.max(Math.abs(a), Math.abs(b)), Number.EPSILON * 8)
  );
}

export function compare(value: number, comparator: Comparator, threshold: number): boolean {
  switch (comparator) {
    case "lt":
      return value < threshold;
    case "lte":
      return value <= threshold;
    case "eq":
      return approximately(value, threshold);
    case "gte":
      return value >= threshold;
    case "gt":
      return value > threshold;
    default:
      return false;
  }
}

export function evaluateCondition(
  cond: Condition,
  source: MetricSource,
  resolver: MetricResolver,
): boolean {
  return compare(resolver.read(cond.variable, source), cond.comparator, cond.threshold);
}

/**
 * Reduce a condition list to one boolean under the given policy.
 * Evaluation is pure, so short-circuiting is not observable.
 */
export function isSatisfied(
  policy: CombinationPolicy,
  conditions: readonly Condition[],
  evaluate: (cond: Condition) => boolean,
): boolean {
  switch (policy) {
    case "all":
      return conditions.every(evaluate);
    case "any":
      return conditions.some(evaluate);
    default:
      return false;
  }
}
