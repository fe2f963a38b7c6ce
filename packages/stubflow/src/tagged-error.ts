/**
 * Tagged error classes: errors with a string `_tag` discriminant and typed props.
 *
 * @example
 * ```typescript
 * class StubClosed extends TaggedError("StubClosed", {
 *   message: (p: { workflowId: string }) => `Stub for ${p.workflowId} is closed`,
 * }) {}
 *
 * const error = new StubClosed({ workflowId: "order-1" });
 * error._tag;       // "StubClosed"
 * error.workflowId; // "order-1"
 * ```
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Shape shared by every tagged error instance.
 */
export interface TaggedErrorBase<Tag extends string = string> extends Error {
  readonly _tag: Tag;
}

/**
 * Options for defining a tagged error class.
 */
export type TaggedErrorOptions<P> = {
  /** Builds the error message from the props. Defaults to the tag. */
  message?: (props: P) => string;
};

/**
 * Options for creating a single tagged error instance.
 */
export type TaggedErrorCreateOptions = {
  /** Underlying error, exposed as `error.cause`. */
  cause?: unknown;
};

/**
 * Constructor returned by {@link TaggedError}.
 */
export type TaggedErrorConstructor<Tag extends string, P extends object> = new (
  props: P,
  options?: TaggedErrorCreateOptions
) => TaggedErrorBase<Tag> & Readonly<P>;

/** Extract the tag literal of a tagged error type. */
export type TagOf<E> = E extends TaggedErrorBase<infer Tag> ? Tag : never;

/** Select the member of a tagged error union with the given tag. */
export type ErrorByTag<E, Tag extends string> = Extract<E, { _tag: Tag }>;

/** Props carried by a tagged error type, without the Error members. */
export type PropsOf<E> = Omit<E, keyof TaggedErrorBase>;

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a base class for a tagged error.
 *
 * The props type is inferred from the `message` builder; every prop is copied
 * onto the instance.
 */
export function TaggedError<Tag extends string, P extends object = object>(
  tag: Tag,
  options: TaggedErrorOptions<P> = {}
): TaggedErrorConstructor<Tag, P> {
  const buildMessage = options.message ?? (() => tag);

  class Tagged extends Error {
    readonly _tag: Tag = tag;

    constructor(props: P, createOptions?: TaggedErrorCreateOptions) {
      super(
        buildMessage(props),
        createOptions?.cause === undefined ? undefined : { cause: createOptions.cause }
      );
      this.name = tag;
      Object.assign(this, props);
    }
  }

  // Props are assigned at runtime; the constructor type carries them.
  return Tagged as TaggedErrorConstructor<Tag, P>;
}

/**
 * Check whether a value is a tagged error (optionally with a specific tag).
 */
TaggedError.isTaggedError = function isTaggedError(
  value: unknown,
  tag?: string
): value is TaggedErrorBase {
  if (!(value instanceof Error) || !("_tag" in value)) return false;
  const actual = value._tag;
  if (typeof actual !== "string") return false;
  return tag === undefined || actual === tag;
};
