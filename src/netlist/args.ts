import type { CircuitSection } from "./circuit.js";
import { MalformedArgumentError } from "./errors.js";

/** One argument token; bare tokens (no `=`) carry a null value. */
export type ArgumentEntry = [key: string, value: string | null];

/** Argument tokens in source order. Repeated keys and bare tokens are kept. */
export type ArgumentList = ArgumentEntry[];

export function unpackArgs(args: readonly string[]): ArgumentList {
  return args.map((token): ArgumentEntry => {
    const eq = token.indexOf("=");
    return eq === -1 ? [token, null] : [token.slice(0, eq), token.slice(eq + 1)];
  });
}

export function repackArgs(args: readonly (readonly [string, string | null])[]): string[] {
  return args.map(([key, value]) => (value === null ? key : `${key}=${value}`));
}

/**
 * Sets `key=value` in an element's arguments. The first `key=...` token is
 * updated; when there is none the pair is appended. A bare positional token of
 * that name cannot take a value and is rejected without touching the circuit.
 */
export function replaceArgument(circuit: CircuitSection, id: string, key: string, value: string): CircuitSection {
  const element = circuit.get(id);
  const args = unpackArgs(element.args);

  const keyed = args.find(([k, v]) => k === key && v !== null);
  if (keyed) keyed[1] = value;
  else if (args.some(([k]) => k === key)) throw new MalformedArgumentError(id, key);
  else args.push([key, value]);

  circuit.set(id, { ...element, args: repackArgs(args) });
  return circuit;
}
