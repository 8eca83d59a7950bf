import type { ZodError } from "zod";

export type CraftingErrorCode = "NOT_FOUND" | "INVALID_INPUT";

/** Base class for failures that abort a calculation. */
export abstract class CraftingError extends Error {
  abstract readonly code: CraftingErrorCode;
}

export class NotFoundError extends CraftingError {
  readonly code = "NOT_FOUND";

  constructor(
    readonly entity: "recipe" | "item",
    readonly itemId: number,
    message = `No ${entity} found for item ${itemId}`,
  ) {
    super(message);
    this.name = "NotFoundError";
  }
}

/** No recipe produces the requested item, or its recipe has no components. */
export class RecipeNotFoundError extends NotFoundError {
  constructor(outputItemId: number) {
    super("recipe", outputItemId, `Recipe not found for item ${outputItemId}`);
    this.name = "RecipeNotFoundError";
  }
}

/** A recipe references a component item the catalog doesn't know. */
export class ItemNotFoundError extends NotFoundError {
  constructor(itemId: number) {
    super("item", itemId, `Item ${itemId} not found in catalog`);
    this.name = "ItemNotFoundError";
  }
}

export class InvalidInputError extends CraftingError {
  readonly code = "INVALID_INPUT";

  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }

  /** Flatten zod issues into one message, e.g. "quantity: Number must be greater than or equal to 1". */
  static fromZod(error: ZodError): InvalidInputError {
    const message = error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    return new InvalidInputError(message);
  }
}
