/**
 * Phase condition expressions
 * Templates and external definitions carry conditions as short strings:
 *
 *   key            input is truthy
 *   !key           input is falsy or missing
 *   key == value   input, rendered as a string, equals value
 *   key != value   input, rendered as a string, differs from value
 *
 * Values may be wrapped in single or double quotes.
 */

import { PhaseCondition, ResultBag, WorkflowPhase } from '../types/models';
import { Result, ok, err } from '../types/result';

const KEY = '[A-Za-z_][A-Za-z0-9_.-]*';
const COMPARISON = new RegExp(`^(${KEY})\\s*(==|!=)\\s*(.+)$`);
const PRESENCE = new RegExp(`^(!?)\\s*(${KEY})$`);

function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    if ((first === '"' || first === "'") && trimmed[trimmed.length - 1] === first) {
      return trimmed.slice(1, -1);
    }
  }
  return trimmed;
}

function render(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Compile a condition expression into a predicate over phase inputs
 */
export function compileCondition(expression: string): Result<PhaseCondition, string> {
  const source = expression.trim();

  const comparison = COMPARISON.exec(source);
  if (comparison) {
    const [, key, operator, rawValue] = comparison;
    const expected = unquote(rawValue);
    return ok((inputs: Readonly<ResultBag>) =>
      operator === '==' ? render(inputs[key]) === expected : render(inputs[key]) !== expected
    );
  }

  const presence = PRESENCE.exec(source);
  if (presence) {
    const [, negated, key] = presence;
    return ok((inputs: Readonly<ResultBag>) => (negated ? !inputs[key] : Boolean(inputs[key])));
  }

  return err(`Invalid condition expression: "${expression}"`);
}

/**
 * Predicate that decides whether a phase runs, or null when it always runs.
 * An explicit `condition` wins over `conditionExpression`.
 */
export function resolvePhaseCondition(phase: Readonly<WorkflowPhase>): Result<PhaseCondition | null, string> {
  if (phase.condition) {
    return ok(phase.condition);
  }
  if (phase.conditionExpression === undefined) {
    return ok(null);
  }
  return compileCondition(phase.conditionExpression);
}
