export class SelectableSequenceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SelectableSequenceError";
  }
}

export class IndexOutOfRangeError
  extends SelectableSequenceError
{
  constructor(
    readonly index: number,
    readonly length: number,
  ) {
    super(
      `Index ${index} is out of range for a sequence of length ${length}`,
    );
    this.name = "IndexOutOfRangeError";
  }
}

/** No element of the sequence satisfied a `selectWhere` predicate. */
export class NoMatchError
  extends SelectableSequenceError
{
  constructor(readonly length: number) {
    super(
      `No element matched the predicate in a sequence of length ${length}`,
    );
    this.name = "NoMatchError";
  }
}
