import type { JsonObject, JsonValue } from "@incident/shared";
import { UnresolvedReferenceError } from "../errors.js";

const REFERENCE = /\{\{\s*([^{}]+?)\s*\}\}/g;
const WHOLE_REFERENCE = /^\{\{\s*([^{}]+?)\s*\}\}$/;

export interface ResolutionScope {
  context: JsonObject;
  /** Outputs materialized so far in this run, by task name. */
  outputs: ReadonlyMap<string, JsonObject>;
  /** Every task name in the playbook, so `name.output.*` is never read from the context. */
  taskNames: ReadonlySet<string>;
}

function walk(value: JsonValue | undefined, segments: string[]): JsonValue | undefined {
  let current = value;
  for (const segment of segments) {
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      current = current[Number(segment)];
    } else if (current !== null && typeof current === "object" && !Array.isArray(current) && Object.hasOwn(current, segment)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

export function lookupReference(reference: string, scope: ResolutionScope): JsonValue {
  const segments = reference.split(".");
  const [head, marker, ...field] = segments;
  const value =
    marker === "output" && scope.taskNames.has(head)
      ? walk(scope.outputs.get(head), field)
      : walk(scope.context, segments);
  if (value === undefined) {
    throw new UnresolvedReferenceError(reference);
  }
  return value;
}

function interpolate(value: JsonValue): string {
  if (typeof value === "string") return value;
  if (value !== null && typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function resolveString(text: string, scope: ResolutionScope): JsonValue {
  const whole = WHOLE_REFERENCE.exec(text);
  if (whole) {
    return lookupReference(whole[1], scope);
  }
  return resolveTemplate(text, scope);
}

/** Interpolates every reference in `text`; the result is always a string. */
export function resolveTemplate(text: string, scope: ResolutionScope): string {
  return text.replace(REFERENCE, (_match, reference: string) => interpolate(lookupReference(reference, scope)));
}

function resolveValue(value: JsonValue, scope: ResolutionScope): JsonValue {
  if (typeof value === "string") return resolveString(value, scope);
  if (Array.isArray(value)) return value.map((item) => resolveValue(item, scope));
  if (value !== null && typeof value === "object") return resolveInputs(value, scope);
  return value;
}

/**
 * Substitutes `{{task.output.field}}` and `{{contextVar}}` references anywhere in the
 * inputs. A string that is exactly one reference takes the referenced value as is; any
 * reference that cannot be resolved throws `UnresolvedReferenceError`.
 */
export function resolveInputs(inputs: JsonObject, scope: ResolutionScope): JsonObject {
  const resolved: JsonObject = {};
  for (const [key, value] of Object.entries(inputs)) {
    resolved[key] = resolveValue(value, scope);
  }
  return resolved;
}
