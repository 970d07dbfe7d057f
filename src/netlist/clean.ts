/**
 * Netlist text normalization.
 *
 * Turns raw netlist text into one statement per line so the parser can split
 * on single spaces. The steps below are order-sensitive: quote-aware space
 * removal must see already-collapsed whitespace, and lowercasing must come
 * last so `.include` paths keep their case.
 */

const DROPPED_LINE_RE = /^\+\s*$|^\s*$|^\*/;
const EOL_COMMENT_RE = /(?<!\\)\$.*$/;
const CONTINUATION_RE = /^\+\s*/;
const INCLUDE_RE = /^\.include\b/i;

export function cleanNetlist(netlist: string | readonly string[]): string {
  const lines = typeof netlist === "string" ? netlist.split(/\r?\n/) : netlist;

  const kept = lines.map((line) => line.trimStart()).filter((line) => !DROPPED_LINE_RE.test(line));

  const uncommented = kept.map((line) => line.replace(EOL_COMMENT_RE, "").trimEnd()).filter((line) => line);

  const joined: string[] = [];
  for (const line of uncommented) {
    if (CONTINUATION_RE.test(line)) {
      const rest = line.replace(CONTINUATION_RE, "");
      if (joined.length) joined[joined.length - 1] += ` ${rest}`;
      else joined.push(rest);
    } else {
      joined.push(line);
    }
  }

  return joined
    .map((line) => line.replace(/[\t ]+/g, " ").trim())
    .map(removeEnclosedSpace)
    .map((line) => line.replace(/ *= */g, "="))
    .map((line) => (INCLUDE_RE.test(line) ? line : line.toLowerCase()))
    .join("\n");
}

/** Drops spaces between pairs of single quotes, e.g. `'a + b'` -> `'a+b'`. */
export function removeEnclosedSpace(line: string): string {
  let quoted = false;
  let out = "";
  for (const c of line) {
    if (c === "'") {
      quoted = !quoted;
      out += c;
    } else if (!(quoted && c === " ")) {
      out += c;
    }
  }
  return out;
}
