export class NetlistError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Raised while turning a line into an element; carries the offending line. */
export class NetlistParseError extends NetlistError {
  readonly lineIndex: number;
  readonly line: string;

  constructor(reason: string, lineIndex: number, line: string) {
    super(`${reason} (line ${lineIndex}: "${line}")`);
    this.lineIndex = lineIndex;
    this.line = line;
  }
}

export class UnknownElementTypeError extends NetlistParseError {
  constructor(lineIndex: number, line: string) {
    super("Line type not understood by parser", lineIndex, line);
  }
}

export class UnbalancedHierarchyError extends NetlistParseError {
  constructor(lineIndex: number, line: string) {
    super(".ends without a matching .subckt", lineIndex, line);
  }
}

export class DuplicateIdentifierError extends NetlistParseError {
  readonly id: string;

  constructor(id: string, lineIndex: number, line: string) {
    super(`Identifier ${id} is not unique`, lineIndex, line);
    this.id = id;
  }
}

export class UnknownIdentifierError extends NetlistError {
  readonly id: string;

  constructor(id: string) {
    super(`No circuit element with identifier ${id}`);
    this.id = id;
  }
}

export class MalformedArgumentError extends NetlistError {
  readonly id: string;
  readonly key: string;

  constructor(id: string, key: string) {
    super(`Argument "${key}" of element ${id} has no assigned value to replace`);
    this.id = id;
    this.key = key;
  }
}
