/** Base class for every fatal error raised while running a transform. */
export class TransformError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TransformError";
  }
}

/**
 * Bad configuration: unknown column, malformed filter, sort on an absent
 * column. `field` is the dotted path of the offending config entry.
 */
export class ValidationError extends TransformError {
  readonly field: string;
  /** Message without the field prefix. */
  readonly reason: string;

  constructor(field: string, reason: string) {
    super(`${field}: ${reason}`);
    this.name = "ValidationError";
    this.field = field;
    this.reason = reason;
  }
}

export type JoinSide = "left" | "right";

/** A declared join key column is absent from its table. */
export class JoinKeyNotFound extends TransformError {
  readonly step: number;
  readonly side: JoinSide;
  readonly column: string;
  readonly dataset: string;

  constructor(step: number, side: JoinSide, column: string, dataset: string) {
    super(
      `Join step ${step + 1}: ${side} key column '${column}' not found in ${side === "left" ? "joined table" : "dataset"} '${dataset}'`
    );
    this.name = "JoinKeyNotFound";
    this.step = step;
    this.side = side;
    this.column = column;
    this.dataset = dataset;
  }
}

export class DatasetNotFound extends TransformError {
  readonly dataset: string;

  constructor(dataset: string) {
    super(`Dataset not found: ${dataset}`);
    this.name = "DatasetNotFound";
    this.dataset = dataset;
  }
}
