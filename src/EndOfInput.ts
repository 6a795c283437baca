/**
 * Returned when a read asks for more bytes than remain.
 * The reader that produced it has not moved.
 */
export class EndOfInput extends Error {
  constructor() {
    super('end of input');
    this.name = 'EndOfInput';
  }
}

/** Type guard: checks if a value is an EndOfInput error. */
export function isEndOfInput(value: unknown): value is EndOfInput {
  return value instanceof EndOfInput;
}
