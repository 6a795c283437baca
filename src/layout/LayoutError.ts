/** Thrown when a layout definition cannot be built into a decoder. */
export class LayoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LayoutError';
  }
}
