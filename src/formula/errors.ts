/** Raised for any formula that cannot be lexed, parsed or evaluated */
export class FormulaError extends Error {
  readonly position: number | null;

  constructor(message: string, position: number | null = null) {
    super(position === null ? message : `${message} at position ${position}`);
    this.name = "FormulaError";
    this.position = position;
  }
}
